// Import necessary modules from Express, JWT, and custom modules.
import { Response, NextFunction } from "express";
import jwt from "jsonwebtoken";
import { AuthenticatedRequest, AuthenticatedUser } from "../types/request";
import { AuthService } from "../services/authService";
import { UserRepository } from "../repository/userRepository";
import { loggerFactory, ApiRouteLogger, AuthRouteLogger, ErrorRouteLogger } from "../factory/loggerFactory";
import { ErrorManager, describeError } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";

// Initialize loggers and error manager.
const apiLogger: ApiRouteLogger = loggerFactory.createApiLogger();
const authLogger: AuthRouteLogger = loggerFactory.createAuthLogger();
const errorLogger: ErrorRouteLogger = loggerFactory.createErrorLogger();
const errorManager = ErrorManager.getInstance();

export interface AuthDependencies {
    authService: AuthService;
    userRepository: UserRepository;
}

export type AuthHandler = (req: AuthenticatedRequest, res: Response, next: NextFunction) => void | Promise<void>;

export interface AuthMiddleware {
    checkAuthHeader: AuthHandler;
    extractToken: AuthHandler;
    verifyToken: AuthHandler;
    verifyUserExists: AuthHandler;
    requireAdmin: AuthHandler;
    authenticateToken: AuthHandler[];
    authenticateAdmin: AuthHandler[];
}

// Builds the authentication chain over the given token service and user lookup.
export function createAuthMiddleware({ authService, userRepository }: AuthDependencies): AuthMiddleware {
    // Check authorization header.
    const checkAuthHeader = (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
        if (!req.headers.authorization) {
            apiLogger.log("Authorization check failed - missing header", {
                reason: "Authorization header missing",
                ip: req.ip,
                path: req.path,
                method: req.method
            });
            next(errorManager.createError(ErrorStatus.jwtNotValid, "Access token required"));
            return;
        }
        next();
    };

    // Extracts the Bearer token from the Authorization header.
    const extractToken = (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
        const [scheme, token] = (req.headers.authorization ?? "").split(" ");
        if (scheme !== "Bearer" || !token) {
            apiLogger.log("Token extraction failed", {
                reason: "Invalid token format, expected \"Bearer <token>\"",
                ip: req.ip
            });
            next(errorManager.createError(ErrorStatus.jwtNotValid, "Invalid token format"));
            return;
        }

        // Attach the token to the request object for downstream middleware
        req.token = token;
        next();
    };

    // Verifies the JWT signature and expiration.
    const verifyToken = (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
        if (!req.token) {
            next(errorManager.createError(ErrorStatus.jwtNotValid, "Access token required"));
            return;
        }
        try {
            req.user = authService.verifyToken(req.token);
            authLogger.logTokenValidation(req.user.userId, req.user.email, true);
            next();
        } catch (error) {
            let reason = "Unknown token error";
            if (error instanceof jwt.TokenExpiredError) reason = "Token expired";
            else if (error instanceof jwt.JsonWebTokenError) reason = "Invalid token signature";

            errorLogger.logAuthenticationError(undefined, reason);
            next(errorManager.createError(ErrorStatus.jwtNotValid, "Invalid or expired token"));
        }
    };

    // Verifies that the user from the token actually exists.
    const verifyUserExists = async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
        const principal = req.user;
        if (!principal) {
            next(errorManager.createError(ErrorStatus.jwtNotValid, "Invalid token - user not found"));
            return;
        }
        try {
            const user = await userRepository.getUserById(principal.userId);
            if (!user) {
                authLogger.logTokenValidation(principal.userId, principal.email, false);
                next(errorManager.createError(ErrorStatus.jwtNotValid, "Invalid token - user not found"));
                return;
            }

            // The stored role wins over the one embedded when the token was issued.
            req.user = { userId: user.id, email: user.email, isAdmin: user.isAdmin };
            next();
        } catch (error) {
            errorLogger.logDatabaseError("VERIFY_USER_EXISTS", "users", describeError(error));
            next(errorManager.createError(ErrorStatus.readInternalServerError, "User verification failed"));
        }
    };

    // Admin-only guard, placed after the authentication chain.
    const requireAdmin = (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
        const authorized = req.user?.isAdmin === true;
        authLogger.logAdminCheck(req.user?.userId ?? "none", authorized);
        if (!authorized) {
            errorLogger.logAuthorizationError(req.user?.userId, req.path);
            next(errorManager.createError(ErrorStatus.adminPrivilegesRequiredError));
            return;
        }
        next();
    };

    // Composed middleware functions using the chain
    const authenticateToken = [checkAuthHeader, extractToken, verifyToken, verifyUserExists];

    return {
        checkAuthHeader,
        extractToken,
        verifyToken,
        verifyUserExists,
        requireAdmin,
        authenticateToken,
        authenticateAdmin: [...authenticateToken, requireAdmin]
    };
}

// Returns the principal set by the authentication chain.
export function currentUser(req: AuthenticatedRequest): AuthenticatedUser {
    if (!req.user) {
        throw errorManager.createError(ErrorStatus.jwtNotValid, "Access token required");
    }
    return req.user;
}
