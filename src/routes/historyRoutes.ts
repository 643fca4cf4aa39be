import { Router } from "express";
import { HistoryController } from "../controllers/historyController";
import { AuthMiddleware } from "../middleware/authMiddleware";
import { validateHistoryQuery } from "../middleware/validationMiddleware";
import { asyncHandler } from "../utils/asyncHandler";

// Creates the caller's history routes.
export function createHistoryRoutes(historyController: HistoryController, auth: AuthMiddleware): Router {
    const router = Router();

    router.get("/translations", ...auth.authenticateToken, ...validateHistoryQuery, asyncHandler(historyController.listTranslations));

    router.get("/transactions", ...auth.authenticateToken, ...validateHistoryQuery, asyncHandler(historyController.listTransactions));

    return router;
}
