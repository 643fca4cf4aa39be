// Import necessary modules from winston and express.
import { Response } from "express";
import winston from "winston";
import { Logger } from "./logger";
import { AuthenticatedRequest } from "../types/request";

// Define a common interface for log data to ensure type safety.
export interface LogData {
    [key: string]: string | number | boolean | null | undefined | string[] | Record<string, unknown>;
}

// Decorator Interface
export interface LoggerDecorator {
    log(message: string, data?: LogData): void;
}

// Base Logger Decorator
export abstract class BaseLoggerDecorator implements LoggerDecorator {
    protected logger: winston.Logger;

    // Accept an optional wrapped logger for chaining decorators
    constructor(protected wrappedLogger?: LoggerDecorator) {
        this.logger = Logger.getInstance();
    }

    // Tag applied to every entry written by this decorator.
    protected abstract readonly category: string;

    // Winston level used when no wrapped logger is present.
    protected readonly level: "info" | "warn" | "error" = "info";

    log(message: string, data?: LogData): void {
        const decoratedData = { type: this.category, ...data };
        if (this.wrappedLogger) {
            this.wrappedLogger.log(message, decoratedData);
        } else {
            this.logger.log(this.level, message, decoratedData);
        }
    }
}

// User Route Logger Decorator
export class UserRouteLogger extends BaseLoggerDecorator {
    protected readonly category = "USER_ACTION";

    // Log user creation events
    logUserCreation(userId: string, email: string): void {
        this.log("USER_CREATED", { userId, email });
    }

    // Log user login events
    logUserLogin(email: string, success: boolean): void {
        this.log("USER_LOGIN", { email, success });
    }

    // Log user retrieval events
    logUserRetrieval(userId: string): void {
        this.log("USER_RETRIEVED", { userId });
    }
}

// Auth Route Logger Decorator
export class AuthRouteLogger extends BaseLoggerDecorator {
    protected readonly category = "AUTH_ACTION";

    // Log token validation events
    logTokenValidation(userId: string, email: string, success: boolean): void {
        this.log("TOKEN_VALIDATED", { email, userId, success });
    }

    // Log admin check events
    logAdminCheck(userId: string, authorized: boolean): void {
        this.log("ADMIN_CHECKED", { userId, authorized });
    }
}

// API Request/Response Logger Decorator
export class ApiRouteLogger extends BaseLoggerDecorator {
    protected readonly category = "API_ACTION";

    // Log API request events
    logRequest(req: AuthenticatedRequest): void {
        this.log(`API_REQUEST: ${req.method} ${req.path}`, {
            method: req.method,
            path: req.path,
            userId: req.user?.userId,
            ip: req.ip,
            userAgent: req.get("User-Agent")
        });
    }

    // Log API response events
    logResponse(req: AuthenticatedRequest, res: Response, executionTime?: number): void {
        this.log(`API_RESPONSE: ${req.method} ${req.path} - ${res.statusCode}`, {
            method: req.method,
            path: req.path,
            statusCode: res.statusCode,
            userId: req.user?.userId,
            executionTime,
            ip: req.ip
        });
    }

    // Log API error events
    logError(req: AuthenticatedRequest, error: unknown): void {
        const errorData = {
            method: req.method,
            path: req.path,
            userId: req.user?.userId,
            error: error instanceof Error ? error.message : String(error),
            stack: error instanceof Error ? error.stack : undefined,
            ip: req.ip
        };
        if (this.wrappedLogger) {
            this.wrappedLogger.log(`API_ERROR: ${req.method} ${req.path}`, errorData);
        } else {
            this.logger.error(`API_ERROR: ${req.method} ${req.path}`, { type: "API_ERROR", ...errorData });
        }
    }
}

// Error Logger Decorator
export class ErrorRouteLogger extends BaseLoggerDecorator {
    protected readonly category = "ERROR";
    protected readonly level = "error";

    // Log validation error events
    logValidationError(field: string, value: string | number | undefined, message: string): void {
        this.log("VALIDATION_ERROR", { field, value, message });
    }

    // Log authentication error events
    logAuthenticationError(email?: string, reason?: string): void {
        this.log("AUTHENTICATION_ERROR", { email, reason });
    }

    // Log authorization error events
    logAuthorizationError(userId?: string, resource?: string): void {
        this.log("AUTHORIZATION_ERROR", { userId, resource });
    }

    // Log database error events
    logDatabaseError(operation: string, table?: string, error?: string): void {
        this.log("DATABASE_ERROR", { operation, table, error });
    }
}

// Wallet and ledger logger
export class WalletLogger extends BaseLoggerDecorator {
    protected readonly category = "WALLET_ACTION";

    // Log wallet creation on first reference
    logWalletCreated(userId: string): void {
        this.log("WALLET_CREATED", { userId });
    }

    // Log credits added to a wallet
    logCredit(userId: string, amount: number, newBalance: number, reason: string): void {
        this.log("WALLET_CREDITED", { userId, amount, newBalance, reason });
    }

    // Log credits taken from a wallet
    logDebit(userId: string, amount: number, newBalance: number): void {
        this.log("WALLET_DEBITED", { userId, amount, newBalance });
    }

    // Log a refused debit
    logInsufficientFunds(userId: string, balance: number, required: number): void {
        this.log("WALLET_INSUFFICIENT_FUNDS", { userId, balance, required });
    }

    // Log balance reads
    logBalanceCheck(userId: string, balance: number): void {
        this.log("WALLET_BALANCE_CHECKED", { userId, balance });
    }
}

// Translation request logger
export class TranslationLogger extends BaseLoggerDecorator {
    protected readonly category = "TRANSLATION_ACTION";

    // Log the start of a translation request
    logRequestStarted(userId: string, sourceLang: string, targetLang: string, externalId?: string): void {
        this.log("TRANSLATION_STARTED", { userId, sourceLang, targetLang, externalId });
    }

    // Log a replay served from the idempotency gate
    logReplay(userId: string, externalId: string): void {
        this.log("TRANSLATION_REPLAYED", { userId, externalId });
    }

    // Log a completed translation
    logTranslationCompleted(userId: string, translationId: string, cost: number | null): void {
        this.log("TRANSLATION_COMPLETED", { userId, translationId, cost });
    }

    // Log a translator failure
    logTranslatorFailure(userId: string, reason: string): void {
        this.log("TRANSLATOR_FAILED", { userId, reason });
    }
}

// Task queue logger
export class QueueLogger extends BaseLoggerDecorator {
    protected readonly category = "QUEUE_ACTION";

    // Log a published task
    logTaskPublished(queue: string, taskId: string, attempts: number): void {
        this.log("TASK_PUBLISHED", { queue, taskId, attempts });
    }

    // Log a failed publish attempt
    logPublishAttemptFailed(queue: string, taskId: string, attempt: number, error: string): void {
        this.log("TASK_PUBLISH_ATTEMPT_FAILED", { queue, taskId, attempt, error });
    }

    // Log a delivery picked up by a worker
    logTaskReceived(taskId: string, attempts: number): void {
        this.log("TASK_RECEIVED", { taskId, attempts });
    }

    // Log a successful task
    logTaskSucceeded(taskId: string, cost: number | null): void {
        this.log("TASK_SUCCEEDED", { taskId, cost });
    }

    // Log a task sent back for another attempt
    logTaskRetried(taskId: string, attempts: number, delayMs: number, error: string): void {
        this.log("TASK_RETRIED", { taskId, attempts, delayMs, error });
    }

    // Log a task moved to the dead-letter queue
    logTaskDeadLettered(taskId: string, queue: string, reason: string): void {
        this.log("TASK_DEAD_LETTERED", { taskId, queue, reason });
    }

    // Log worker lifecycle events
    logWorkerStarted(queue: string, prefetch: number): void {
        this.log("WORKER_STARTED", { queue, prefetch });
    }

    logWorkerStopped(queue: string): void {
        this.log("WORKER_STOPPED", { queue });
    }
}
