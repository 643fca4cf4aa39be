// Import necessary modules from Express and project files
import { Response, NextFunction } from "express";
import { WalletService } from "../services/walletService";
import { CreditService } from "../services/creditService";
import { loggerFactory, ApiRouteLogger } from "../factory/loggerFactory";
import { HttpStatus } from "../factory/status";
import { AuthenticatedRequest } from "../types/request";
import { currentUser } from "../middleware/authMiddleware";
import { readBody } from "../middleware/validationMiddleware";
import { publicTransaction } from "../utils/serializers";

// Balance reads and self top-ups for the authenticated user.
export class WalletController {
    private readonly apiLogger: ApiRouteLogger = loggerFactory.createApiLogger();

    constructor(private readonly walletService: WalletService, private readonly creditService: CreditService) {}

    // Returns the caller's balance, creating an empty wallet on first use.
    public getBalance = async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);

        try {
            const { userId } = currentUser(req);
            const balance = await this.walletService.getBalance(userId);
            res.status(HttpStatus.OK).json({ success: true, data: { userId, balance } });
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error);
            next(error);
        }
    };

    // Adds credits to the caller's wallet; the amount is validated by the route.
    public topUp = async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);

        try {
            const { userId } = currentUser(req);
            const result = await this.creditService.topUp(userId, Number(readBody(req).amount));
            res.status(HttpStatus.OK).json({
                success: true,
                message: "Wallet topped up successfully",
                data: { balance: result.balance, transaction: publicTransaction(result.transaction) }
            });
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error);
            next(error);
        }
    };
}
