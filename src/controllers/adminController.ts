// import necessary modules and types
import { Response, NextFunction } from "express";
import { CreditService } from "../services/creditService";
import { HistoryService } from "../services/historyService";
import { loggerFactory, ApiRouteLogger } from "../factory/loggerFactory";
import { HttpStatus } from "../factory/status";
import { AuthenticatedRequest } from "../types/request";
import { currentUser } from "../middleware/authMiddleware";
import { readAdminFilter, readBody } from "../middleware/validationMiddleware";
import { publicTransaction, publicTranslation } from "../utils/serializers";

// AdminController grants bonus credits and exposes the ledger across all users.
export class AdminController {
    private readonly apiLogger: ApiRouteLogger = loggerFactory.createApiLogger();

    constructor(private readonly creditService: CreditService, private readonly historyService: HistoryService) {}

    // Credits any user's wallet with a TOPUP ledger entry.
    public approveBonus = async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);

        try {
            const admin = currentUser(req);
            const body = readBody(req);
            const result = await this.creditService.approveBonus(String(body.userId), Number(body.amount));

            this.apiLogger.log("Admin bonus approved", {
                adminUserId: admin.userId,
                targetUserId: result.userId,
                amount: result.transaction.amount
            });
            res.status(HttpStatus.OK).json({
                success: true,
                message: "Credits granted successfully",
                data: {
                    userId: result.userId,
                    balance: result.balance,
                    transaction: publicTransaction(result.transaction)
                }
            });
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error);
            next(error);
        }
    };

    public viewTransactions = async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);

        try {
            const transactions = await this.historyService.viewTransactions(readAdminFilter(req));
            res.status(HttpStatus.OK).json({ success: true, data: transactions.map(publicTransaction) });
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error);
            next(error);
        }
    };

    public viewTranslations = async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);

        try {
            const translations = await this.historyService.viewTranslations(readAdminFilter(req));
            res.status(HttpStatus.OK).json({ success: true, data: translations.map(publicTranslation) });
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error);
            next(error);
        }
    };
}
