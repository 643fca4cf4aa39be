import express, { Express } from "express"; // Framework for building the web server.
import cors from "cors";       // Middleware to enable Cross-Origin Resource Sharing.
import helmet from "helmet";     // Middleware to help secure the app by setting various HTTP headers.

import { Container } from "./factory/container";
import { createAuthMiddleware } from "./middleware/authMiddleware";
import { routeNotFoundHandler, errorHandlingChain } from "./middleware/errorHandler";
import { UserController } from "./controllers/userController";
import { WalletController } from "./controllers/walletController";
import { TranslationController } from "./controllers/translationController";
import { HistoryController } from "./controllers/historyController";
import { AdminController } from "./controllers/adminController";
import { createAppRoutes } from "./routes/appRoutes";
import { createUserRoutes } from "./routes/userRoutes";
import { createWalletRoutes } from "./routes/walletRoutes";
import { createTranslationRoutes } from "./routes/translationRoutes";
import { createHistoryRoutes } from "./routes/historyRoutes";
import { createAdminRoutes } from "./routes/adminRoutes";

// Builds the Express application over an already wired container.
export function createApp(container: Container): Express {
    const app = express();

    // Use Helmet to set security-related HTTP response headers.
    app.use(helmet());

    // Use CORS to allow cross-origin requests.
    app.use(cors());

    // Middleware to parse incoming JSON payloads.
    app.use(express.json({ limit: "1mb" }));

    const auth = createAuthMiddleware({
        authService: container.authService,
        userRepository: container.userRepository
    });

    // Mount the application-level routes.
    app.use("/", createAppRoutes());
    app.use("/api/auth", createUserRoutes(new UserController(container.userRepository, container.authService), auth));
    app.use("/api/wallet", createWalletRoutes(new WalletController(container.walletService, container.creditService), auth));
    app.use("/api/translate", createTranslationRoutes(
        new TranslationController(container.processor, container.taskBridge, container.config.translation.syncFundsPolicy),
        auth
    ));
    app.use("/api/history", createHistoryRoutes(new HistoryController(container.historyService), auth));
    app.use("/api/admin", createAdminRoutes(new AdminController(container.creditService, container.historyService), auth));

    // Mount the error handler
    app.use(routeNotFoundHandler);

    // Mount the error handling middleware chain.
    app.use(...errorHandlingChain);

    return app;
}
