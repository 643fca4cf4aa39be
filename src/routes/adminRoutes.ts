import { Router } from "express";
import { AdminController } from "../controllers/adminController";
import { AuthMiddleware } from "../middleware/authMiddleware";
import { validateAdminQuery, validateAdminTopUp } from "../middleware/validationMiddleware";
import { asyncHandler } from "../utils/asyncHandler";

// Creates the admin routes; all of them require authentication and admin privileges.
export function createAdminRoutes(adminController: AdminController, auth: AuthMiddleware): Router {
    const router = Router();

    // Route for granting bonus credits
    router.post("/topup", ...auth.authenticateAdmin, ...validateAdminTopUp, asyncHandler(adminController.approveBonus));

    // Route for listing ledger entries across users
    router.get("/transactions", ...auth.authenticateAdmin, ...validateAdminQuery, asyncHandler(adminController.viewTransactions));

    // Route for listing translations across users
    router.get("/translations", ...auth.authenticateAdmin, ...validateAdminQuery, asyncHandler(adminController.viewTranslations));

    return router;
}
