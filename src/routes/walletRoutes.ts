import { Router } from "express";
import { WalletController } from "../controllers/walletController";
import { AuthMiddleware } from "../middleware/authMiddleware";
import { validateTopUp } from "../middleware/validationMiddleware";
import { asyncHandler } from "../utils/asyncHandler";

// Creates the caller's wallet routes.
export function createWalletRoutes(walletController: WalletController, auth: AuthMiddleware): Router {
    const router = Router();

    // READ - Current balance.
    router.get("/", ...auth.authenticateToken, asyncHandler(walletController.getBalance));

    // UPDATE - Self top-up; invalid amounts never reach the wallet.
    router.post("/topup", ...auth.authenticateToken, ...validateTopUp, asyncHandler(walletController.topUp));

    return router;
}
