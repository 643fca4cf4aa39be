// Import Express types and the authenticated request shape.
import { Response, NextFunction } from "express";
import { AuthenticatedHandler, AuthenticatedRequest } from "../types/request";

//Wrap async controller calls in a function that catches errors, so that a void is returned.
export function asyncHandler(fn: AuthenticatedHandler) {
    return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
        void Promise.resolve(fn(req, res, next)).catch(next);
    };
}
