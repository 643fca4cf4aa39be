// Import necessary modules from Express and project files
import { Response, NextFunction } from "express";
import { HistoryService } from "../services/historyService";
import { loggerFactory, ApiRouteLogger } from "../factory/loggerFactory";
import { HttpStatus } from "../factory/status";
import { AuthenticatedRequest } from "../types/request";
import { currentUser } from "../middleware/authMiddleware";
import { readPageQuery } from "../middleware/validationMiddleware";
import { publicTransaction, publicTranslation } from "../utils/serializers";

// The caller's own translation and ledger history, newest first.
export class HistoryController {
    private readonly apiLogger: ApiRouteLogger = loggerFactory.createApiLogger();

    constructor(private readonly historyService: HistoryService) {}

    public listTranslations = async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);

        try {
            const { userId } = currentUser(req);
            const translations = await this.historyService.listTranslations(userId, readPageQuery(req));
            res.status(HttpStatus.OK).json({ success: true, data: translations.map(publicTranslation) });
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error);
            next(error);
        }
    };

    public listTransactions = async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);

        try {
            const { userId } = currentUser(req);
            const transactions = await this.historyService.listTransactions(userId, readPageQuery(req));
            res.status(HttpStatus.OK).json({ success: true, data: transactions.map(publicTransaction) });
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error);
            next(error);
        }
    };
}
