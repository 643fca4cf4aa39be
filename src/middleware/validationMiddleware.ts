import { Request, Response, NextFunction } from "express";
import { ErrorManager } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, ErrorRouteLogger } from "../factory/loggerFactory";
import { MAX_LEDGER_AMOUNT, TransactionType } from "../dao/ledgerStore";
import { AdminFilter, PageRequest } from "../services/historyService";

// Initialize error manager and logger
const errorManager: ErrorManager = ErrorManager.getInstance();
const errorLogger: ErrorRouteLogger = loggerFactory.createErrorLogger();

const UUID_PATTERN = /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/;
const DIGITS = /^\d+$/;
const TRANSACTION_TYPES: readonly TransactionType[] = ["TOPUP", "DEBIT"];

// Returns the JSON body as a plain record, or an empty one when it is missing.
export function readBody(req: Request): Record<string, unknown> {
    const body: unknown = req.body;
    if (typeof body !== "object" || body === null || Array.isArray(body)) {
        return {};
    }
    return { ...body };
}

// Returns a single-valued query parameter.
export function queryString(req: Request, name: string): string | undefined {
    const value = req.query[name];
    return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}

function queryInteger(req: Request, name: string): number | undefined {
    const value = queryString(req, name);
    return value === undefined ? undefined : Number(value);
}

function queryDate(req: Request, name: string): Date | undefined {
    const value = queryString(req, name);
    return value === undefined ? undefined : new Date(value);
}

function isTransactionType(value: string): value is TransactionType {
    return TRANSACTION_TYPES.some(type => type === value);
}

// Reads skip/limit after validatePagination has run.
export function readPageQuery(req: Request): PageRequest {
    return { skip: queryInteger(req, "skip"), limit: queryInteger(req, "limit") };
}

// Reads the admin listing filters after validateAdminFilters has run.
export function readAdminFilter(req: Request): AdminFilter {
    const type = queryString(req, "type")?.toUpperCase();
    return {
        ...readPageQuery(req),
        userId: queryString(req, "userId"),
        type: type !== undefined && isTransactionType(type) ? type : undefined,
        from: queryDate(req, "from"),
        to: queryDate(req, "to")
    };
}

// Generic UUID validation middleware
export const validateUUID = (paramName: string) => {
    return (req: Request, res: Response, next: NextFunction): void => {
        const paramValue = req.params[paramName];
        if (paramValue && !UUID_PATTERN.test(paramValue)) {
            errorLogger.logValidationError("uuidFormat", paramValue, `Invalid UUID format for ${paramName}`);
            next(errorManager.createError(ErrorStatus.invalidFormat, `Invalid ${paramName} format`));
            return;
        }
        next();
    };
};

// Checks that a translation body carries the three text fields.
export const validateTranslationBody = (req: Request, res: Response, next: NextFunction): void => {
    const { inputText, sourceLang, targetLang } = readBody(req);
    const missingFields: string[] = [];
    if (typeof inputText !== "string") missingFields.push("inputText");
    if (typeof sourceLang !== "string") missingFields.push("sourceLang");
    if (typeof targetLang !== "string") missingFields.push("targetLang");

    if (missingFields.length > 0) {
        errorLogger.logValidationError("translationBody", missingFields.join(", "), "Missing or non-string fields");
        next(errorManager.createError(
            ErrorStatus.invalidFormat,
            `The following fields are required and must be strings: ${missingFields.join(", ")}`
        ));
        return;
    }
    next();
};

// Rejects any credit amount that is not a positive integer before it reaches the wallet.
export const validateAmount = (req: Request, res: Response, next: NextFunction): void => {
    const { amount } = readBody(req);
    if (typeof amount !== "number" || !Number.isSafeInteger(amount) || amount <= 0) {
        errorLogger.logValidationError("amount", typeof amount === "number" ? amount : String(amount), "Amount must be a positive integer");
        next(errorManager.createError(
            ErrorStatus.invalidAmountError,
            `Amount must be a positive integer, got ${JSON.stringify(amount) ?? "nothing"}`
        ));
        return;
    }
    if (amount > MAX_LEDGER_AMOUNT) {
        errorLogger.logValidationError("amount", amount, "Amount above the ledger maximum");
        next(errorManager.createError(ErrorStatus.invalidAmountError, `Amount must not exceed ${MAX_LEDGER_AMOUNT}, got ${amount}`));
        return;
    }
    next();
};

// Checks the target user of an admin grant.
export const validateTargetUser = (req: Request, res: Response, next: NextFunction): void => {
    const { userId } = readBody(req);
    if (typeof userId !== "string" || !UUID_PATTERN.test(userId)) {
        errorLogger.logValidationError("userId", typeof userId === "string" ? userId : undefined, "Invalid user id");
        next(errorManager.createError(ErrorStatus.invalidFormat, "userId must be a valid UUID"));
        return;
    }
    next();
};

// skip and limit, when present, must be non-negative integers; bounds are checked by the history service.
export const validatePagination = (req: Request, res: Response, next: NextFunction): void => {
    for (const name of ["skip", "limit"]) {
        const value = queryString(req, name);
        if (value !== undefined && !DIGITS.test(value)) {
            errorLogger.logValidationError(name, value, "Pagination parameter is not an integer");
            next(errorManager.createError(ErrorStatus.invalidPaginationError, `${name} must be a non-negative integer`));
            return;
        }
    }
    next();
};

// Validates the optional admin listing filters.
export const validateAdminFilters = (req: Request, res: Response, next: NextFunction): void => {
    const userId = queryString(req, "userId");
    if (userId !== undefined && !UUID_PATTERN.test(userId)) {
        errorLogger.logValidationError("userId", userId, "Invalid user id filter");
        next(errorManager.createError(ErrorStatus.invalidFormat, "userId must be a valid UUID"));
        return;
    }

    const type = queryString(req, "type");
    if (type !== undefined && !isTransactionType(type.toUpperCase())) {
        errorLogger.logValidationError("type", type, "Unknown transaction type");
        next(errorManager.createError(ErrorStatus.invalidFormat, `type must be one of ${TRANSACTION_TYPES.join(", ")}`));
        return;
    }

    for (const name of ["from", "to"]) {
        const value = queryDate(req, name);
        if (value !== undefined && Number.isNaN(value.getTime())) {
            errorLogger.logValidationError(name, queryString(req, name), "Invalid date");
            next(errorManager.createError(ErrorStatus.invalidFormat, `${name} must be an ISO 8601 date`));
            return;
        }
    }
    next();
};

// Composed validation chains
export const validateTopUp = [validateAmount];
export const validateAdminTopUp = [validateTargetUser, validateAmount];
export const validateHistoryQuery = [validatePagination];
export const validateAdminQuery = [validatePagination, validateAdminFilters];
export const validateTaskIdFormat = validateUUID("taskId");
