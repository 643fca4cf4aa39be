// Import the base Express request type.
import { Request, Response, NextFunction } from "express";

// The principal attached by the authentication chain.
export interface AuthenticatedUser {
    userId: string;
    email: string;
    isAdmin: boolean;
}

// Express request carrying the bearer token and the authenticated principal.
export interface AuthenticatedRequest extends Request {
    user?: AuthenticatedUser;
    token?: string;
}

// Express handler signature used by controllers behind the authentication chain.
export type AuthenticatedHandler = (req: AuthenticatedRequest, res: Response, next: NextFunction) => Promise<void>;
