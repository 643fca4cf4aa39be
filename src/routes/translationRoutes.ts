import { Router } from "express";
import { TranslationController } from "../controllers/translationController";
import { AuthMiddleware } from "../middleware/authMiddleware";
import { validateTaskIdFormat, validateTranslationBody } from "../middleware/validationMiddleware";
import { asyncHandler } from "../utils/asyncHandler";

// Creates the synchronous and queued translation routes.
export function createTranslationRoutes(translationController: TranslationController, auth: AuthMiddleware): Router {
    const router = Router();

    router.post("/", ...auth.authenticateToken, validateTranslationBody, asyncHandler(translationController.translate));

    router.post("/queue", ...auth.authenticateToken, validateTranslationBody, asyncHandler(translationController.enqueue));

    router.get("/tasks/:taskId", ...auth.authenticateToken, validateTaskIdFormat, asyncHandler(translationController.getTaskStatus));

    return router;
}
