// Import the Router from Express to create modular route handlers.
import { Router } from "express";
import { UserController } from "../controllers/userController";
import { validateUserCreation, validateLogin } from "../middleware/userMiddleware";
import { AuthMiddleware } from "../middleware/authMiddleware";
import { asyncHandler } from "../utils/asyncHandler";

// Creates the registration, login and profile routes.
export function createUserRoutes(userController: UserController, auth: AuthMiddleware): Router {
    const router = Router();

    //This routes use spread syntax to apply multiple middleware functions.

    // CREATE - Register a new user.
    router.post("/register", ...validateUserCreation, asyncHandler(userController.register));

    // LOGIN - Authenticate a user and return a token.
    router.post("/login", ...validateLogin, asyncHandler(userController.login));

    // READ - Get the profile of the currently authenticated user.
    router.get("/me", ...auth.authenticateToken, asyncHandler(userController.getProfile));

    return router;
}
