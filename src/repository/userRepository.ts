// Import the ledger store contract, bcrypt and project factories.
import bcrypt from "bcrypt";
import { LedgerStore, UserRecord } from "../dao/ledgerStore";
import { ErrorManager, describeError, isAppError } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, UserRouteLogger, ErrorRouteLogger } from "../factory/loggerFactory";
import { normalizeEmail } from "../utils/credentials";

// Define a simple interface for user data.
export interface UserData {
    email: string;
    password: string;
    isAdmin?: boolean;
}

// UserRepository handles registration, credential checks and lookups over the ledger store.
export class UserRepository {
    private readonly errorManager: ErrorManager;
    private readonly userLogger: UserRouteLogger;
    private readonly errorLogger: ErrorRouteLogger;

    constructor(private readonly store: LedgerStore, private readonly bcryptRounds: number) {
        this.errorManager = ErrorManager.getInstance();
        this.userLogger = loggerFactory.createUserLogger();
        this.errorLogger = loggerFactory.createErrorLogger();
    }

    // Creates a user and their zero-balance wallet in one unit of work.
    public async createUser(data: UserData): Promise<UserRecord> {
        const email = normalizeEmail(data.email);
        if (await this.store.findUserByEmail(email)) {
            throw this.errorManager.createError(ErrorStatus.userAlreadyExistsError);
        }

        try {
            const passwordHash = await bcrypt.hash(data.password, this.bcryptRounds);
            // A concurrent registration that wins the race surfaces as userAlreadyExistsError from the store.
            const user = await this.store.transaction(async (session) => {
                const created = await session.insertUser({ email, passwordHash, isAdmin: data.isAdmin ?? false });
                await session.ensureWallet(created.id);
                return created;
            });
            this.userLogger.logUserCreation(user.id, user.email);
            return user;
        } catch (error) {
            if (isAppError(error)) {
                throw error;
            }
            this.errorLogger.logDatabaseError("CREATE_USER", "users", describeError(error));
            throw this.errorManager.createError(ErrorStatus.userCreationFailedError);
        }
    }

    // Validates user login credentials
    public async validateLogin(email: string, password: string): Promise<UserRecord | null> {
        const user = await this.store.findUserByEmail(normalizeEmail(email));
        if (!user) {
            return null;
        }
        const matches = await bcrypt.compare(password, user.passwordHash);
        return matches ? user : null;
    }

    // Retrieves a user by their ID.
    public async getUserById(id: string): Promise<UserRecord | null> {
        return this.store.findUserById(id);
    }

    // Retrieves a user by their email.
    public async getUserByEmail(email: string): Promise<UserRecord | null> {
        return this.store.findUserByEmail(normalizeEmail(email));
    }
}
