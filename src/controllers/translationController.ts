// Import necessary modules from Express and project files
import { Response, NextFunction } from "express";
import { FundsPolicy, TranslationProcessor } from "../services/translationProcessor";
import { TranslationTaskBridge } from "../queue/translationTaskBridge";
import { loggerFactory, ApiRouteLogger } from "../factory/loggerFactory";
import { HttpStatus } from "../factory/status";
import { AuthenticatedRequest } from "../types/request";
import { currentUser } from "../middleware/authMiddleware";
import { readBody } from "../middleware/validationMiddleware";

// Translation entry points: synchronous, queued, and queued-task status.
export class TranslationController {
    private readonly apiLogger: ApiRouteLogger = loggerFactory.createApiLogger();

    constructor(
        private readonly processor: TranslationProcessor,
        private readonly taskBridge: TranslationTaskBridge,
        private readonly fundsPolicy: FundsPolicy
    ) {}

    // Translates and debits within the request.
    public translate = async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);

        try {
            const { userId } = currentUser(req);
            const body = readBody(req);
            const outcome = await this.processor.process({
                userId,
                inputText: String(body.inputText),
                sourceLang: String(body.sourceLang),
                targetLang: String(body.targetLang)
            }, this.fundsPolicy);

            res.status(HttpStatus.OK).json({
                success: true,
                data: {
                    translationId: outcome.translationId,
                    outputText: outcome.outputText,
                    sourceLang: outcome.sourceLang,
                    targetLang: outcome.targetLang,
                    cost: outcome.cost
                }
            });
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error);
            next(error);
        }
    };

    // Queues the request for the worker and answers 202 with the task id.
    public enqueue = async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);

        try {
            const { userId } = currentUser(req);
            const body = readBody(req);
            // Invalid input is answered now instead of being dead-lettered by the worker.
            const request = this.processor.validate({
                userId,
                inputText: String(body.inputText),
                sourceLang: String(body.sourceLang),
                targetLang: String(body.targetLang)
            });
            const taskId = await this.taskBridge.publish({
                userId,
                inputText: request.inputText,
                sourceLang: request.sourceLang,
                targetLang: request.targetLang
            });

            res.status(HttpStatus.ACCEPTED).json({
                success: true,
                message: "Translation task queued",
                data: { taskId, status: "queued" }
            });
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error);
            next(error);
        }
    };

    // Reports whether a queued task has produced its translation.
    public getTaskStatus = async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);

        try {
            const { userId } = currentUser(req);
            const status = await this.taskBridge.getStatus(req.params.taskId, userId);
            res.status(HttpStatus.OK).json({ success: true, data: status });
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error);
            next(error);
        }
    };
}
