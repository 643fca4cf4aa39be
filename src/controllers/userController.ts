// Import necessary modules from Express and project files
import { Response, NextFunction } from "express";
import { UserRepository } from "../repository/userRepository";
import { AuthService } from "../services/authService";
import { loggerFactory, UserRouteLogger, ApiRouteLogger } from "../factory/loggerFactory";
import { ErrorManager } from "../factory/errorManager";
import { ErrorStatus, HttpStatus } from "../factory/status";
import { AuthenticatedRequest } from "../types/request";
import { currentUser } from "../middleware/authMiddleware";
import { readBody } from "../middleware/validationMiddleware";
import { publicUser } from "../utils/serializers";

// Controller responsible for registration, login and the caller's profile.
export class UserController {
    private readonly userLogger: UserRouteLogger;
    private readonly apiLogger: ApiRouteLogger;
    private readonly errorManager: ErrorManager;

    constructor(private readonly userRepository: UserRepository, private readonly authService: AuthService) {
        this.userLogger = loggerFactory.createUserLogger();
        this.apiLogger = loggerFactory.createApiLogger();
        this.errorManager = ErrorManager.getInstance();
    }

    // Handles new user registration; the wallet is created with the user.
    public register = async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);

        try {
            const { email, password } = readBody(req);
            const user = await this.userRepository.createUser({ email: String(email), password: String(password) });

            // Respond with 201 Created for successful resource creation.
            res.status(HttpStatus.CREATED).json({
                success: true,
                message: "User created successfully",
                data: publicUser(user)
            });
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error);
            next(error);
        }
    };

    // Handles user login, validating credentials and issuing a JWT on success.
    public login = async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);

        try {
            const body = readBody(req);
            const email = String(body.email);
            const user = await this.userRepository.validateLogin(email, String(body.password));

            if (!user) {
                this.userLogger.logUserLogin(email, false);
                next(this.errorManager.createError(ErrorStatus.userLoginError));
                return;
            }

            const token = this.authService.issueToken(user);
            this.userLogger.logUserLogin(email, true);
            res.status(HttpStatus.OK).json({
                success: true,
                message: "Login successful",
                data: { token, user: publicUser(user) }
            });
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error);
            next(error);
        }
    };

    // Retrieves the authenticated user's profile.
    public getProfile = async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
        const startTime = Date.now();
        this.apiLogger.logRequest(req);

        try {
            const { userId } = currentUser(req);
            const user = await this.userRepository.getUserById(userId);
            if (!user) {
                next(this.errorManager.createError(ErrorStatus.userNotFoundError));
                return;
            }

            this.userLogger.logUserRetrieval(userId);
            res.status(HttpStatus.OK).json({ success: true, data: publicUser(user) });
            this.apiLogger.logResponse(req, res, Date.now() - startTime);
        } catch (error) {
            this.apiLogger.logError(req, error);
            next(error);
        }
    };
}
