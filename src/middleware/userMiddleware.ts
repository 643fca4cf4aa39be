// Import necessary types from Express and custom factory modules.
import { Request, Response, NextFunction } from "express";
import { ErrorManager } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, ErrorRouteLogger } from "../factory/loggerFactory";
import { isValidEmail, normalizeEmail, passwordPolicyViolation } from "../utils/credentials";
import { readBody } from "./validationMiddleware";

// Initialize error manager and logger
const errorManager: ErrorManager = ErrorManager.getInstance();
const errorLogger: ErrorRouteLogger = loggerFactory.createErrorLogger();

// checkRequiredFields checks that email and password are present and non-blank.
export const checkRequiredFields = (req: Request, res: Response, next: NextFunction): void => {
    const body = readBody(req);
    const { email, password } = body;

    const missingFields: string[] = [];
    if (typeof email !== "string" || !email.trim()) missingFields.push("email");
    if (typeof password !== "string" || !password.trim()) missingFields.push("password");

    if (missingFields.length > 0) {
        errorLogger.logValidationError("requiredFields", missingFields.join(", "), "Missing or empty required fields");
        next(errorManager.createError(
            ErrorStatus.invalidFormat,
            `The following fields are required and cannot be empty or contain only spaces: ${missingFields.join(", ")}`
        ));
        return;
    }
    next();
};

// validateEmailFormat normalizes the email and checks its format.
export const validateEmailFormat = (req: Request, res: Response, next: NextFunction): void => {
    const body = readBody(req);
    if (typeof body.email !== "string") {
        next();
        return;
    }

    const email = normalizeEmail(body.email);
    if (!isValidEmail(email)) {
        errorLogger.logValidationError("emailFormat", email, "Invalid email format");
        next(errorManager.createError(
            ErrorStatus.emailNotValid,
            "Email format is invalid. Please provide a valid email address with a proper domain"
        ));
        return;
    }

    // Update body with trimmed and lowercased email
    req.body = { ...body, email };
    next();
};

// validatePasswordStrength applies the password policy; passwords are never trimmed.
export const validatePasswordStrength = (req: Request, res: Response, next: NextFunction): void => {
    const { password } = readBody(req);
    const violation = typeof password === "string" ? passwordPolicyViolation(password) : "Password is required";
    if (violation) {
        errorLogger.logValidationError("passwordStrength", "length: " + (typeof password === "string" ? password.length : 0), violation);
        next(errorManager.createError(ErrorStatus.passwordTooWeak, violation));
        return;
    }
    next();
};

// checkLoginFields checks for the presence of email and password in the login request.
export const checkLoginFields = (req: Request, res: Response, next: NextFunction): void => {
    const body = readBody(req);
    const { email, password } = body;

    if (typeof email !== "string" || typeof password !== "string" || !email.trim() || !password) {
        errorLogger.logValidationError("loginFields", "email and password", "Missing or empty login fields");
        next(errorManager.createError(
            ErrorStatus.loginBadRequest,
            "Email and password are required and cannot be empty or contain only spaces"
        ));
        return;
    }

    // Login looks users up by the normalized email.
    req.body = { ...body, email: normalizeEmail(email) };
    next();
};

// Middleware for validating registration requests
export const validateUserCreation = [
    checkRequiredFields,
    validateEmailFormat,
    validatePasswordStrength
];

// Middleware for validating login requests
export const validateLogin = [
    checkLoginFields
];
