// Import necessary modules from Sequelize, uuid and project files.
import {
    DatabaseError,
    ForeignKeyConstraintError,
    Op,
    QueryTypes,
    Sequelize,
    Transaction as DbTransaction,
    UniqueConstraintError,
    WhereOptions
} from "sequelize";
import { v4 as uuidv4 } from "uuid";
import { User, Wallet, WalletTransaction, Translation } from "../models";
import { WalletTransactionAttributes } from "../models/WalletTransaction";
import { TranslationAttributes } from "../models/Translation";
import { ErrorManager, isAppError } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, ErrorRouteLogger } from "../factory/loggerFactory";
import {
    LedgerConstraintError,
    LedgerQuery,
    LedgerReader,
    LedgerSession,
    LedgerStore,
    MAX_LEDGER_AMOUNT,
    NewTransaction,
    NewTranslation,
    NewUser,
    TransactionQuery,
    TransactionRecord,
    TranslationRecord,
    UserRecord,
    WalletRecord
} from "./ledgerStore";

const errorManager = ErrorManager.getInstance();

// PostgreSQL SQLSTATE codes the ledger reacts to.
const LOCK_NOT_AVAILABLE = "55P03";
const DEADLOCK_DETECTED = "40P01";
const CHECK_VIOLATION = "23514";
const NUMERIC_OUT_OF_RANGE = "22003";

export interface SequelizeLedgerOptions {
    lockTimeoutMs: number;
}

function toUser(user: User): UserRecord {
    return { id: user.id, email: user.email, passwordHash: user.passwordHash, isAdmin: user.isAdmin, createdAt: user.createdAt };
}

function toWallet(wallet: Wallet): WalletRecord {
    return { id: wallet.id, userId: wallet.userId, balance: wallet.balance };
}

function toTransaction(entry: WalletTransaction): TransactionRecord {
    return { id: entry.id, userId: entry.userId, amount: entry.amount, type: entry.type, timestamp: entry.timestamp };
}

function toTranslation(entry: Translation): TranslationRecord {
    return {
        id: entry.id,
        userId: entry.userId,
        externalId: entry.externalId,
        inputText: entry.inputText,
        outputText: entry.outputText,
        sourceLang: entry.sourceLang,
        targetLang: entry.targetLang,
        cost: entry.cost,
        timestamp: entry.timestamp
    };
}

// Builds the user and date filters shared by both history tables.
function historyWhere(query: LedgerQuery): { userId?: string; timestamp?: { [Op.gte]?: Date; [Op.lte]?: Date } } {
    const where: { userId?: string; timestamp?: { [Op.gte]?: Date; [Op.lte]?: Date } } = {};
    if (query.userId) {
        where.userId = query.userId;
    }
    if (query.from || query.to) {
        where.timestamp = {};
        if (query.from) where.timestamp[Op.gte] = query.from;
        if (query.to) where.timestamp[Op.lte] = query.to;
    }
    return where;
}

// Reads the SQLSTATE carried by the driver error, when there is one.
function sqlState(error: DatabaseError): string | undefined {
    const parent: Error = error.parent;
    return "code" in parent && typeof parent.code === "string" ? parent.code : undefined;
}

// Read queries, optionally bound to a running transaction.
class SequelizeLedgerReader implements LedgerReader {
    constructor(protected readonly boundTransaction?: DbTransaction) {}

    async findUserById(userId: string): Promise<UserRecord | null> {
        const user = await User.findByPk(userId, { transaction: this.boundTransaction });
        return user ? toUser(user) : null;
    }

    async findUserByEmail(email: string): Promise<UserRecord | null> {
        const user = await User.findOne({ where: { email }, transaction: this.boundTransaction });
        return user ? toUser(user) : null;
    }

    async findWallet(userId: string): Promise<WalletRecord | null> {
        const wallet = await Wallet.findOne({ where: { userId }, transaction: this.boundTransaction });
        return wallet ? toWallet(wallet) : null;
    }

    async findTranslationByExternalId(externalId: string): Promise<TranslationRecord | null> {
        const entry = await Translation.findOne({ where: { externalId }, transaction: this.boundTransaction });
        return entry ? toTranslation(entry) : null;
    }

    async listTransactions(query: TransactionQuery): Promise<TransactionRecord[]> {
        const where: WhereOptions<WalletTransactionAttributes> = query.type
            ? { ...historyWhere(query), type: query.type }
            : historyWhere(query);
        const rows = await WalletTransaction.findAll({
            where,
            order: [["timestamp", "DESC"], ["id", "DESC"]],
            offset: query.offset,
            limit: query.limit,
            transaction: this.boundTransaction
        });
        return rows.map(toTransaction);
    }

    async listTranslations(query: LedgerQuery): Promise<TranslationRecord[]> {
        const where: WhereOptions<TranslationAttributes> = historyWhere(query);
        const rows = await Translation.findAll({
            where,
            order: [["timestamp", "DESC"], ["id", "DESC"]],
            offset: query.offset,
            limit: query.limit,
            transaction: this.boundTransaction
        });
        return rows.map(toTranslation);
    }
}

// Writes and row locks inside one database transaction.
class SequelizeLedgerSession extends SequelizeLedgerReader implements LedgerSession {
    constructor(private readonly sequelize: Sequelize, private readonly unitOfWork: DbTransaction) {
        super(unitOfWork);
    }

    async insertUser(user: NewUser): Promise<UserRecord> {
        const created = await User.create(
            { email: user.email, passwordHash: user.passwordHash, isAdmin: user.isAdmin ?? false },
            { transaction: this.unitOfWork }
        );
        return toUser(created);
    }

    // Upsert: a concurrent inserter blocks on the unique index until the other commits.
    async ensureWallet(userId: string): Promise<boolean> {
        if (await this.findWallet(userId)) {
            return false;
        }
        const inserted = await this.sequelize.query<{ id: string }>(
            "INSERT INTO wallets (id, user_id, balance) VALUES (:id, :userId, 0) ON CONFLICT (user_id) DO NOTHING RETURNING id",
            { replacements: { id: uuidv4(), userId }, type: QueryTypes.SELECT, transaction: this.unitOfWork }
        );
        return inserted.length > 0;
    }

    async lockWallet(userId: string): Promise<WalletRecord | null> {
        const wallet = await Wallet.findOne({
            where: { userId },
            transaction: this.unitOfWork,
            lock: this.unitOfWork.LOCK.UPDATE
        });
        return wallet ? toWallet(wallet) : null;
    }

    async updateWalletBalance(walletId: string, balance: number): Promise<void> {
        await Wallet.update({ balance }, { where: { id: walletId }, transaction: this.unitOfWork });
    }

    async appendTransaction(entry: NewTransaction): Promise<TransactionRecord> {
        const created = await WalletTransaction.create(entry, { transaction: this.unitOfWork });
        return toTransaction(created);
    }

    async appendTranslation(entry: NewTranslation): Promise<TranslationRecord> {
        const created = await Translation.create(entry, { transaction: this.unitOfWork });
        return toTranslation(created);
    }
}

// LedgerStore backed by PostgreSQL through Sequelize.
export class SequelizeLedgerStore extends SequelizeLedgerReader implements LedgerStore {
    private readonly errorLogger: ErrorRouteLogger;

    constructor(private readonly sequelize: Sequelize, private readonly options: SequelizeLedgerOptions) {
        super();
        if (!Number.isSafeInteger(options.lockTimeoutMs) || options.lockTimeoutMs <= 0) {
            throw new Error(`Invalid lock timeout: ${options.lockTimeoutMs}`);
        }
        this.errorLogger = loggerFactory.createErrorLogger();
    }

    async transaction<T>(work: (session: LedgerSession) => Promise<T>): Promise<T> {
        try {
            return await this.sequelize.transaction(async (t) => {
                // SET does not take bind parameters; the value is a validated integer.
                await this.sequelize.query(`SET LOCAL lock_timeout = '${this.options.lockTimeoutMs}ms'`, { transaction: t });
                return work(new SequelizeLedgerSession(this.sequelize, t));
            });
        } catch (error) {
            throw this.translateError(error);
        }
    }

    async close(): Promise<void> {
        await this.sequelize.close();
    }

    // Maps driver errors onto ledger errors; anything unrecognised is returned unchanged.
    private translateError(error: unknown): unknown {
        if (isAppError(error)) {
            return error;
        }

        if (error instanceof UniqueConstraintError) {
            const fields = Object.keys(error.fields);
            if (fields.includes("email")) {
                return errorManager.createError(ErrorStatus.userAlreadyExistsError);
            }
            if (fields.includes("external_id")) {
                return errorManager.createError(ErrorStatus.externalIdConflictError);
            }
            return error;
        }

        if (error instanceof ForeignKeyConstraintError) {
            return errorManager.createError(ErrorStatus.userNotFoundError);
        }

        if (error instanceof DatabaseError) {
            const code = sqlState(error);
            if (code === LOCK_NOT_AVAILABLE || code === DEADLOCK_DETECTED) {
                this.errorLogger.logDatabaseError("LOCK_WALLET", "wallets", error.message);
                return errorManager.createError(ErrorStatus.walletLockTimeoutError);
            }
            if (code === NUMERIC_OUT_OF_RANGE) {
                this.errorLogger.logDatabaseError("NUMERIC_RANGE", "wallets", error.message);
                return errorManager.createError(ErrorStatus.invalidAmountError, `Amount must not exceed ${MAX_LEDGER_AMOUNT}`);
            }
            if (code === CHECK_VIOLATION) {
                this.errorLogger.logDatabaseError("CHECK_CONSTRAINT", undefined, error.message);
                return new LedgerConstraintError("check", error.message);
            }
        }
        return error;
    }
}
