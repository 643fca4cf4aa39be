// Enumeration of HTTP status codes
export enum HttpStatus {
    OK = 200, // Successful request
    CREATED = 201, // Resource created successfully
    ACCEPTED = 202, // Request queued for asynchronous processing
    BAD_REQUEST = 400, // Client error: Bad request
    UNAUTHORIZED = 401, // Client error: Unauthorized
    PAYMENT_REQUIRED = 402, // Client error: Not enough credits
    FORBIDDEN = 403, // Client error: Forbidden
    NOT_FOUND = 404, // Client error: Not found
    CONFLICT = 409, // Client error: Conflicting resource
    UNPROCESSABLE_ENTITY = 422, // Client error: Semantically invalid input
    INTERNAL_SERVER_ERROR = 500, // Server error: Internal server error
    BAD_GATEWAY = 502, // Server error: Upstream service failed
    SERVICE_UNAVAILABLE = 503, // Server error: Service unavailable
    GATEWAY_TIMEOUT = 504 // Server error: Upstream service timed out
}

// Enumeration of error statuses
export enum ErrorStatus {
    userLoginError, // User login error message
    emailNotValid, // Invalid email format error
    passwordTooWeak, // Password policy violation
    loginBadRequest, // Login bad request error message
    jwtNotValid, // JWT authentication failure
    userNotAuthorized, // Authorization error message
    adminPrivilegesRequiredError, // Admin privileges required error
    readInternalServerError, // Error during resource read
    resourceNotFoundError, // Resource not found error
    resourceAlreadyPresent, // Resource already exists error
    invalidFormat, // Invalid format error
    routeNotFound, // Route not found error
    userNotFoundError, // User not found error
    userAlreadyExistsError, // User already exists error
    userCreationFailedError, // User creation failed error
    emptyInputError, // Input text blank after trimming
    inputTooLongError, // Input text over the configured maximum
    invalidLanguageCodeError, // Malformed language code
    unsupportedLanguagePairError, // Translator cannot handle the pair
    invalidAmountError, // Credit amount not a positive integer
    invalidPaginationError, // Skip or limit out of bounds
    insufficientFundsError, // Wallet balance below the cost
    walletLockTimeoutError, // Wallet lock not acquired in time
    translationFailedError, // Translator failed
    translationTimeoutError, // Translator did not answer in time
    externalIdConflictError, // External id already used by another user
    taskPublishFailedError, // Queue publish failed after retries
    invalidTaskPayloadError, // Queue message could not be used
    defaultError // Default error message
}

// Interface for response objects
export interface Response {
    message: string; // The message to return
    status: number; // HTTP status code
    retryable: boolean; // Whether repeating the same call may succeed
    type: string; // Type of response
}

// Interface for message objects
export interface Message {
    getResponse(): Response; // Method to get the response object
}

// Abstract class for message factories
export abstract class MessageFactory {
    abstract getMessage(type: ErrorStatus): Message; // Abstract method to get a message based on the type
}
