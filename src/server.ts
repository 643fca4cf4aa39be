import dotenv from "dotenv";     // Module to load environment variables from a .env file.
import { Server } from "http";
import { loadConfig } from "./config/appConfig";
import { buildContainer } from "./factory/container";
import { describeError } from "./factory/errorManager";
import { createApp } from "./app";
import logger from "./utils/logger";

// Loads configuration, wires dependencies, seeds the admin and starts listening.
export async function bootstrap(): Promise<Server> {
    dotenv.config();
    const config = loadConfig();
    const container = await buildContainer(config);

    // Initialize admin user from environment variables
    await container.adminInitService.initializeAdminUser();

    if (config.queue.embeddedWorker) {
        await container.worker.start();
    }

    const app = createApp(container);
    const server = app.listen(config.port, () => {
        logger.info("Server started successfully", {
            port: config.port,
            ledgerDriver: config.ledgerDriver,
            queueDriver: config.queueDriver,
            embeddedWorker: config.queue.embeddedWorker,
            healthCheckUrl: `http://localhost:${config.port}/health`,
            apiBaseUrl: `http://localhost:${config.port}/api`
        });
    });

    // Graceful shutdown: stop accepting requests, then release the container.
    const shutdown = (signal: string): void => {
        logger.info(`Received ${signal}, shutting down`);
        server.close(() => {
            container.close().then(
                () => process.exit(0),
                (error: unknown) => {
                    logger.error("Shutdown failed", { errorMessage: describeError(error) });
                    process.exit(1);
                }
            );
        });
    };
    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));

    return server;
}

if (require.main === module) {
    bootstrap().catch((error: unknown) => {
        // This block executes if initialization fails
        const err = error instanceof Error ? error : new Error("Unknown initialization error");
        logger.error("Failed to initialize application - Application will exit", {
            errorMessage: err.message,
            stack: err.stack
        });
        process.exit(1);
    });
}
