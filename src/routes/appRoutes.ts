// Import the Router from Express to create modular route handlers.
import { Router } from "express";

// Creates the application-level routes.
export function createAppRoutes(): Router {
    const router = Router();

    // A route for the API root.
    router.get("/", (req, res) => {
        res.json({
            message: "Translation Ledger API",
            version: "1.0.0",
            status: "running"
        });
    });

    // A route for health checks.
    router.get("/health", (req, res) => {
        res.status(200).json({
            status: "OK",
            timestamp: new Date().toISOString(),
            uptime: process.uptime()
        });
    });

    return router;
}
