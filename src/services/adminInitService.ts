// import necessary modules and types
import { AdminConfig } from "../config/appConfig";
import { UserRepository } from "../repository/userRepository";
import { CreditService } from "./creditService";
import { ErrorManager, describeError } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, UserRouteLogger, ErrorRouteLogger } from "../factory/loggerFactory";

// Service to initialize the admin user at application startup
export class AdminInitService {
    private readonly errorManager = ErrorManager.getInstance();
    private readonly userLogger: UserRouteLogger = loggerFactory.createUserLogger();
    private readonly errorLogger: ErrorRouteLogger = loggerFactory.createErrorLogger();

    constructor(
        private readonly userRepository: UserRepository,
        private readonly creditService: CreditService,
        private readonly settings: AdminConfig
    ) {}

    // Creates the configured admin with its starting credits unless it already exists.
    public async initializeAdminUser(): Promise<void> {
        const { email, password, initialCredits } = this.settings;

        // Ensure the admin credentials are configured
        if (!email || !password) {
            this.userLogger.log("Admin environment variables not found. Skipping admin user creation.", {
                operation: "INIT_ADMIN_SKIP",
                reason: "missing_env_vars"
            });
            return;
        }

        try {
            if (await this.userRepository.getUserByEmail(email)) {
                this.userLogger.log("Admin user already exists. Skipping creation.", {
                    operation: "INIT_ADMIN_SKIP",
                    reason: "already_exists",
                    adminEmail: email
                });
                return;
            }

            const admin = await this.userRepository.createUser({ email, password, isAdmin: true });
            if (initialCredits > 0) {
                await this.creditService.approveBonus(admin.id, initialCredits);
            }

            this.userLogger.log("Admin user initialized successfully", {
                operation: "INIT_ADMIN_SUCCESS",
                adminUserId: admin.id,
                adminEmail: admin.email,
                initialCredits
            });
        } catch (error) {
            const message = describeError(error);
            this.errorLogger.logDatabaseError("INIT_ADMIN", "users", message);
            throw this.errorManager.createError(
                ErrorStatus.userCreationFailedError,
                `Failed to initialize admin user: ${message}`
            );
        }
    }
}
