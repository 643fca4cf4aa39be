// Import the status enums and the Response/Message contracts.
import { HttpStatus, ErrorStatus, Response, Message, MessageFactory } from "./status";

// Builds a response template; JSON is the only response type.
function template(message: string, status: HttpStatus, retryable = false): Response {
    return { message, status, retryable, type: "application/json" };
}

const defaultResponse = template("An unexpected error occurred.", HttpStatus.INTERNAL_SERVER_ERROR);

// This Map stores the template for each type of error response.
const errorResponseMap: Map<ErrorStatus, Response> = new Map([
    [ErrorStatus.userLoginError, template("User login failed. Please check your credentials.", HttpStatus.UNAUTHORIZED)],
    [ErrorStatus.emailNotValid, template("Invalid email format provided.", HttpStatus.UNPROCESSABLE_ENTITY)],
    [ErrorStatus.passwordTooWeak, template("Password must be at least 8 characters and contain an uppercase letter, a lowercase letter and a digit.", HttpStatus.UNPROCESSABLE_ENTITY)],
    [ErrorStatus.loginBadRequest, template("Bad request during login. Please verify your input.", HttpStatus.BAD_REQUEST)],
    [ErrorStatus.jwtNotValid, template("JWT token is invalid or expired.", HttpStatus.UNAUTHORIZED)],
    [ErrorStatus.userNotAuthorized, template("User is not authorized to access this resource.", HttpStatus.FORBIDDEN)],
    [ErrorStatus.adminPrivilegesRequiredError, template("Admin privileges required for this operation.", HttpStatus.FORBIDDEN)],
    [ErrorStatus.readInternalServerError, template("Internal server error occurred while reading data.", HttpStatus.INTERNAL_SERVER_ERROR)],
    [ErrorStatus.resourceNotFoundError, template("Requested resource was not found.", HttpStatus.NOT_FOUND)],
    [ErrorStatus.resourceAlreadyPresent, template("Resource already exists.", HttpStatus.CONFLICT)],
    [ErrorStatus.invalidFormat, template("Invalid format provided.", HttpStatus.BAD_REQUEST)],
    [ErrorStatus.routeNotFound, template("Route not found.", HttpStatus.NOT_FOUND)],
    [ErrorStatus.userNotFoundError, template("User not found.", HttpStatus.NOT_FOUND)],
    [ErrorStatus.userAlreadyExistsError, template("User with this email already exists.", HttpStatus.CONFLICT)],
    [ErrorStatus.userCreationFailedError, template("Failed to create user.", HttpStatus.INTERNAL_SERVER_ERROR)],
    [ErrorStatus.emptyInputError, template("Input text must not be empty.", HttpStatus.UNPROCESSABLE_ENTITY)],
    [ErrorStatus.inputTooLongError, template("Input text is too long.", HttpStatus.UNPROCESSABLE_ENTITY)],
    [ErrorStatus.invalidLanguageCodeError, template("Invalid language code.", HttpStatus.UNPROCESSABLE_ENTITY)],
    [ErrorStatus.unsupportedLanguagePairError, template("Unsupported language pair.", HttpStatus.UNPROCESSABLE_ENTITY)],
    [ErrorStatus.invalidAmountError, template("Amount must be a positive integer.", HttpStatus.UNPROCESSABLE_ENTITY)],
    [ErrorStatus.invalidPaginationError, template("Invalid pagination parameters.", HttpStatus.UNPROCESSABLE_ENTITY)],
    [ErrorStatus.insufficientFundsError, template("Insufficient credits to perform this operation.", HttpStatus.PAYMENT_REQUIRED)],
    [ErrorStatus.walletLockTimeoutError, template("Wallet is busy, please retry.", HttpStatus.SERVICE_UNAVAILABLE, true)],
    [ErrorStatus.translationFailedError, template("Translation failed.", HttpStatus.BAD_GATEWAY)],
    [ErrorStatus.translationTimeoutError, template("Translation timed out.", HttpStatus.GATEWAY_TIMEOUT, true)],
    [ErrorStatus.externalIdConflictError, template("External id is already in use.", HttpStatus.CONFLICT)],
    [ErrorStatus.taskPublishFailedError, template("Failed to queue the translation task.", HttpStatus.SERVICE_UNAVAILABLE, true)],
    [ErrorStatus.invalidTaskPayloadError, template("Invalid translation task payload.", HttpStatus.UNPROCESSABLE_ENTITY)],
    [ErrorStatus.defaultError, defaultResponse]
]);

// Throwable error carrying its classification and the response sent to clients.
export class AppError extends Error {
    public readonly status: number;
    public readonly errorType: ErrorStatus;
    public readonly retryable: boolean;
    private readonly response: Response;

    constructor(errorType: ErrorStatus, response: Response) {
        super(response.message);
        this.name = "AppError";
        this.errorType = errorType;
        this.status = response.status;
        this.retryable = response.retryable;
        this.response = response;
    }

    // Returns the client-facing response for this error.
    public getResponse(): Response {
        return { ...this.response };
    }
}

// The ErrorMessageFactory is responsible for creating error messages.
export class ErrorMessageFactory extends MessageFactory {
    getMessage(type: ErrorStatus): Message {
        // Fall back to the default template for unmapped types.
        const response = errorResponseMap.get(type) ?? defaultResponse;
        return {
            getResponse: () => response
        };
    }
}

/* The ErrorManager is a singleton responsible for creating standardized
 * error objects that can be used throughout the application.
 */
export class ErrorManager {
    private static instance: ErrorManager;
    private readonly errorFactory: ErrorMessageFactory;

    private constructor() {
        this.errorFactory = new ErrorMessageFactory();
    }

    // Singleton access method
    public static getInstance(): ErrorManager {
        if (!ErrorManager.instance) {
            ErrorManager.instance = new ErrorManager();
        }
        return ErrorManager.instance;
    }

    // Retrieves a standard response template for a given error type.
    public getErrorResponse(errorType: ErrorStatus): Response {
        return this.errorFactory.getMessage(errorType).getResponse();
    }

    // Creates a throwable AppError, optionally overriding the template message.
    public createError(errorType: ErrorStatus, customMessage?: string): AppError {
        const responseTemplate = this.getErrorResponse(errorType);
        return new AppError(errorType, {
            ...responseTemplate,
            message: customMessage || responseTemplate.message
        });
    }
}

// Narrows an unknown thrown value to an AppError.
export function isAppError(error: unknown): error is AppError {
    return error instanceof AppError;
}

// Extracts a printable message from an unknown thrown value.
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
