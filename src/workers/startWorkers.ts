// import necessary modules and configurations
import dotenv from "dotenv";
import { loadConfig } from "../config/appConfig";
import { buildContainer, Container } from "../factory/container";
import { describeError } from "../factory/errorManager";
import { loggerFactory, QueueLogger, ErrorRouteLogger } from "../factory/loggerFactory";

// Initialize loggers
const queueLogger: QueueLogger = loggerFactory.createQueueLogger();
const errorLogger: ErrorRouteLogger = loggerFactory.createErrorLogger();

// Main function to start the translation worker
async function startWorkers(): Promise<Container> {
    dotenv.config();
    queueLogger.log("Starting worker initialization");

    const container = await buildContainer(loadConfig());
    await container.worker.start();
    queueLogger.log("All workers started successfully");

    // Graceful shutdown function
    const gracefulShutdown = async (signal: string): Promise<void> => {
        queueLogger.log(`Received ${signal}, shutting down workers gracefully`);
        try {
            await container.close();
            queueLogger.log("Workers shut down gracefully");
            process.exit(0);
        } catch (error) {
            errorLogger.logDatabaseError("GRACEFUL_SHUTDOWN", "workers", describeError(error));
            process.exit(1);
        }
    };

    // Handle graceful shutdown signals
    process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
    process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

    // Handle unhandled promise rejections
    process.on("unhandledRejection", (reason) => {
        errorLogger.logDatabaseError("UNHANDLED_REJECTION", "workers", describeError(reason));
        process.exit(1);
    });

    return container;
}

// Start workers if this file is run directly
if (require.main === module) {
    startWorkers().catch((error: unknown) => {
        errorLogger.logDatabaseError("START_WORKERS", "workers", describeError(error));
        process.exit(1);
    });
}

export { startWorkers };
