// Import JWT helpers and project types.
import jwt from "jsonwebtoken";
import { AuthConfig } from "../config/appConfig";
import { UserRecord } from "../dao/ledgerStore";
import { AuthenticatedUser } from "../types/request";

// Issues and verifies the bearer tokens identifying the acting user.
export class AuthService {
    constructor(private readonly settings: AuthConfig) {}

    // Signs a token for the given user.
    public issueToken(user: UserRecord): string {
        return jwt.sign(
            { userId: user.id, email: user.email, isAdmin: user.isAdmin },
            this.settings.jwtSecret,
            { expiresIn: this.settings.tokenTtlSeconds }
        );
    }

    // Verifies a token and returns its principal; throws jsonwebtoken errors when invalid.
    public verifyToken(token: string): AuthenticatedUser {
        const decoded = jwt.verify(token, this.settings.jwtSecret);
        if (typeof decoded === "string" || typeof decoded.userId !== "string" || typeof decoded.email !== "string") {
            throw new jwt.JsonWebTokenError("Token payload is missing the user claims");
        }
        return {
            userId: decoded.userId,
            email: decoded.email,
            isAdmin: decoded.isAdmin === true
        };
    }
}
