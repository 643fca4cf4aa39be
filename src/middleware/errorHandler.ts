// Import necessary modules from Express, Sequelize and project factories.
import { Request, Response, NextFunction } from "express";
import { DatabaseError, UniqueConstraintError, ValidationError } from "sequelize";
import { AppError, ErrorManager, describeError, isAppError } from "../factory/errorManager";
import { ErrorStatus, HttpStatus } from "../factory/status";
import { LedgerConstraintError } from "../dao/ledgerStore";
import { loggerFactory, ErrorRouteLogger } from "../factory/loggerFactory";

// Initialize the error logger and error manager instances.
const errorLogger: ErrorRouteLogger = loggerFactory.createErrorLogger();
const errorManager = ErrorManager.getInstance();

// Seconds a client should wait before repeating a retryable request.
const RETRY_AFTER_SECONDS = 1;

// Reads the HTTP status some libraries (body-parser, http-errors) attach to their errors.
function statusOf(err: unknown): number | undefined {
    if (typeof err !== "object" || err === null) {
        return undefined;
    }
    if ("status" in err && typeof err.status === "number") {
        return err.status;
    }
    if ("statusCode" in err && typeof err.statusCode === "number") {
        return err.statusCode;
    }
    return undefined;
}

// Log Errors is a part of the error handling chain that logs error details.
function logErrors(err: unknown, req: Request, res: Response, next: NextFunction): void {
    errorLogger.log("Application error occurred", {
        errorName: err instanceof Error ? err.name : typeof err,
        errorMessage: describeError(err),
        statusCode: isAppError(err) ? err.status : statusOf(err) ?? HttpStatus.INTERNAL_SERVER_ERROR,
        requestUrl: req.originalUrl,
        requestMethod: req.method,
        ip: req.ip
    });
    next(err);
}

// Database error handler for Sequelize and ledger constraint errors the stores did not translate.
function handleDatabaseError(err: unknown, req: Request, res: Response, next: NextFunction): void {
    if (err instanceof LedgerConstraintError) {
        errorLogger.logDatabaseError("LEDGER_CONSTRAINT", err.constraint, err.message);
        next(errorManager.createError(ErrorStatus.defaultError));
        return;
    }

    // Handle Sequelize unique constraint errors
    if (err instanceof UniqueConstraintError) {
        errorLogger.log("Database unique constraint violation", {
            errorType: "SequelizeUniqueConstraintError",
            fields: Object.keys(err.fields).join(", ")
        });
        next(errorManager.createError(ErrorStatus.resourceAlreadyPresent, "Resource with this information already exists"));
        return;
    }

    // Handle Sequelize validation errors
    if (err instanceof ValidationError) {
        const errorMessages = err.errors.map(item => `${item.path ?? "field"}: ${item.message}`).join(", ");
        errorLogger.log("Database validation error", { errorType: "SequelizeValidationError", errors: errorMessages });
        next(errorManager.createError(ErrorStatus.invalidFormat, `Validation failed: ${errorMessages}`));
        return;
    }

    // Handle string too long errors
    if (err instanceof DatabaseError && "code" in err.parent && err.parent.code === "22001") {
        errorLogger.log("Database string length error", { errorType: "SequelizeDatabaseError", code: "22001" });
        next(errorManager.createError(ErrorStatus.invalidFormat, "One or more fields exceed the maximum allowed length"));
        return;
    }

    next(err);
}

// The classifyError middleware turns any remaining error into an AppError.
function classifyError(err: unknown, req: Request, res: Response, next: NextFunction): void {
    if (isAppError(err)) {
        next(err);
        return;
    }

    // Client errors raised by Express itself (malformed JSON, oversized body) keep their message.
    switch (statusOf(err)) {
        case HttpStatus.BAD_REQUEST:
            next(errorManager.createError(ErrorStatus.invalidFormat, describeError(err)));
            return;
        case HttpStatus.UNAUTHORIZED:
            next(errorManager.createError(ErrorStatus.jwtNotValid));
            return;
        case HttpStatus.FORBIDDEN:
            next(errorManager.createError(ErrorStatus.userNotAuthorized));
            return;
        case HttpStatus.NOT_FOUND:
            next(errorManager.createError(ErrorStatus.resourceNotFoundError));
            return;
        default:
            next(errorManager.createError(ErrorStatus.defaultError));
    }
}

// Format Error Response tells clients when a failed request is worth repeating.
function formatErrorResponse(err: AppError, req: Request, res: Response, next: NextFunction): void {
    if (err.retryable && !res.headersSent) {
        res.setHeader("Retry-After", String(RETRY_AFTER_SECONDS));
    }
    next(err);
}

// generalErrorHandler sends the final JSON response to the client.
function generalErrorHandler(err: AppError, req: Request, res: Response, next: NextFunction): void {
    if (res.headersSent) {
        next(err);
        return;
    }

    const response = err.getResponse();
    res.status(response.status).json({
        success: false,
        message: response.message
    });
}

// Route Not Found Handler is a middleware that handles route errors.
export function routeNotFoundHandler(req: Request, res: Response, next: NextFunction): void {
    next(errorManager.createError(
        ErrorStatus.routeNotFound,
        `Route not found: ${req.method} ${req.originalUrl}`
    ));
}

// Error handling chain; every step after classifyError receives an AppError.
export const errorHandlingChain = [
    logErrors,
    handleDatabaseError,
    classifyError,
    formatErrorResponse,
    generalErrorHandler
];
