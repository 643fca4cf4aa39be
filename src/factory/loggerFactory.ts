// Import necessary modules from LoggerDecorator.
import {
    ApiRouteLogger,
    ErrorRouteLogger,
    UserRouteLogger,
    AuthRouteLogger,
    WalletLogger,
    TranslationLogger,
    QueueLogger,
    LoggerDecorator
} from "../utils/loggerDecorator";

// Factory for creating logger decorators
export class LoggerFactory {
    private static instance: LoggerFactory;

    private constructor() {}

    // Get the singleton instance of the LoggerFactory
    public static getInstance(): LoggerFactory {
        if (!LoggerFactory.instance) {
            LoggerFactory.instance = new LoggerFactory();
        }
        return LoggerFactory.instance;
    }

    // Create an API request/response logger instance
    public createApiLogger(wrappedLogger?: LoggerDecorator): ApiRouteLogger {
        return new ApiRouteLogger(wrappedLogger);
    }

    // Create an error logger instance
    public createErrorLogger(wrappedLogger?: LoggerDecorator): ErrorRouteLogger {
        return new ErrorRouteLogger(wrappedLogger);
    }

    // Create a user logger instance
    public createUserLogger(wrappedLogger?: LoggerDecorator): UserRouteLogger {
        return new UserRouteLogger(wrappedLogger);
    }

    // Create an auth logger instance
    public createAuthLogger(wrappedLogger?: LoggerDecorator): AuthRouteLogger {
        return new AuthRouteLogger(wrappedLogger);
    }

    // Create a wallet logger instance
    public createWalletLogger(wrappedLogger?: LoggerDecorator): WalletLogger {
        return new WalletLogger(wrappedLogger);
    }

    // Create a translation logger instance
    public createTranslationLogger(wrappedLogger?: LoggerDecorator): TranslationLogger {
        return new TranslationLogger(wrappedLogger);
    }

    // Create a queue logger instance
    public createQueueLogger(wrappedLogger?: LoggerDecorator): QueueLogger {
        return new QueueLogger(wrappedLogger);
    }
}

// Export singleton instance
export const loggerFactory = LoggerFactory.getInstance();

// Export classes for type imports
export {
    ApiRouteLogger,
    ErrorRouteLogger,
    UserRouteLogger,
    AuthRouteLogger,
    WalletLogger,
    TranslationLogger,
    QueueLogger
};
