// In-process ledger used by tests and single-process development runs.
import { v4 as uuidv4 } from "uuid";
import { ErrorManager } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import {
    LedgerConstraintError,
    LedgerQuery,
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

export interface MemoryLedgerOptions {
    lockTimeoutMs?: number;
    clock?: () => Date;
}

// FIFO mutex per key; waiters give up after a timeout.
class KeyedLock {
    private readonly held = new Set<string>();
    private readonly waiters = new Map<string, Array<() => void>>();

    acquire(key: string, timeoutMs: number): Promise<void> {
        if (!this.held.has(key)) {
            this.held.add(key);
            return Promise.resolve();
        }

        return new Promise<void>((resolve, reject) => {
            const queue = this.waiters.get(key) ?? [];
            const grant = (): void => {
                clearTimeout(timer);
                resolve();
            };
            const timer = setTimeout(() => {
                const index = queue.indexOf(grant);
                if (index >= 0) {
                    queue.splice(index, 1);
                }
                reject(errorManager.createError(ErrorStatus.walletLockTimeoutError));
            }, timeoutMs);
            queue.push(grant);
            this.waiters.set(key, queue);
        });
    }

    // Hands the lock to the next waiter, or frees it.
    release(key: string): void {
        const queue = this.waiters.get(key);
        const next = queue?.shift();
        if (queue && queue.length === 0) {
            this.waiters.delete(key);
        }
        if (next) {
            next();
            return;
        }
        this.held.delete(key);
    }
}

// Newest first; later insertions win timestamp ties.
function newestFirst<T extends { timestamp: Date }>(records: T[]): T[] {
    return [...records].reverse().sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
}

// Applies the shared date/user filters and pagination.
function page<T extends { userId: string; timestamp: Date }>(records: T[], query: LedgerQuery): T[] {
    const filtered = records.filter(record =>
        (query.userId === undefined || record.userId === query.userId) &&
        (query.from === undefined || record.timestamp >= query.from) &&
        (query.to === undefined || record.timestamp <= query.to)
    );
    return newestFirst(filtered).slice(query.offset, query.offset + query.limit);
}

// Uncommitted writes of one unit of work, read back through the session.
class MemoryLedgerSession implements LedgerSession {
    readonly users: UserRecord[] = [];
    readonly wallets = new Map<string, WalletRecord>();
    readonly balances = new Map<string, number>();
    readonly transactions: TransactionRecord[] = [];
    readonly translations: TranslationRecord[] = [];
    readonly locks = new Set<string>();

    constructor(private readonly store: MemoryLedgerStore) {}

    async findUserById(userId: string): Promise<UserRecord | null> {
        return this.users.find(user => user.id === userId) ?? this.store.findUserById(userId);
    }

    async findUserByEmail(email: string): Promise<UserRecord | null> {
        return this.users.find(user => user.email === email) ?? this.store.findUserByEmail(email);
    }

    async findWallet(userId: string): Promise<WalletRecord | null> {
        const wallet = this.wallets.get(userId) ?? await this.store.findWallet(userId);
        if (!wallet) {
            return null;
        }
        return { ...wallet, balance: this.balances.get(wallet.id) ?? wallet.balance };
    }

    async findTranslationByExternalId(externalId: string): Promise<TranslationRecord | null> {
        const entry = this.translations.find(translation => translation.externalId === externalId);
        return entry ? { ...entry } : this.store.findTranslationByExternalId(externalId);
    }

    async listTransactions(query: TransactionQuery): Promise<TransactionRecord[]> {
        const all = [...this.store.committedTransactions(), ...this.transactions];
        return page(all.filter(entry => query.type === undefined || entry.type === query.type), query);
    }

    async listTranslations(query: LedgerQuery): Promise<TranslationRecord[]> {
        return page([...this.store.committedTranslations(), ...this.translations], query);
    }

    async insertUser(user: NewUser): Promise<UserRecord> {
        if (await this.findUserByEmail(user.email)) {
            throw errorManager.createError(ErrorStatus.userAlreadyExistsError);
        }
        const record: UserRecord = {
            id: uuidv4(),
            email: user.email,
            passwordHash: user.passwordHash,
            isAdmin: user.isAdmin ?? false,
            createdAt: this.store.now()
        };
        this.users.push(record);
        return { ...record };
    }

    async ensureWallet(userId: string): Promise<boolean> {
        if (await this.findWallet(userId)) {
            return false;
        }
        if (!await this.findUserById(userId)) {
            throw errorManager.createError(ErrorStatus.userNotFoundError);
        }

        // A concurrent creator holds the user's lock until it commits.
        await this.acquire(userId);
        if (await this.store.findWallet(userId)) {
            return false;
        }
        this.wallets.set(userId, { id: uuidv4(), userId, balance: 0 });
        return true;
    }

    async lockWallet(userId: string): Promise<WalletRecord | null> {
        await this.acquire(userId);
        return this.findWallet(userId);
    }

    async updateWalletBalance(walletId: string, balance: number): Promise<void> {
        if (!Number.isSafeInteger(balance) || balance < 0) {
            throw new LedgerConstraintError("ck_wallets_balance_non_negative", `balance ${balance}`);
        }
        if (balance > MAX_LEDGER_AMOUNT) {
            throw new LedgerConstraintError("wallets_balance_range", `balance ${balance}`);
        }
        this.balances.set(walletId, balance);
    }

    async appendTransaction(entry: NewTransaction): Promise<TransactionRecord> {
        if (!Number.isSafeInteger(entry.amount) || entry.amount <= 0) {
            throw new LedgerConstraintError("ck_transactions_amount_positive", `amount ${entry.amount}`);
        }
        const record: TransactionRecord = { id: uuidv4(), ...entry, timestamp: this.store.now() };
        this.transactions.push(record);
        return { ...record };
    }

    async appendTranslation(entry: NewTranslation): Promise<TranslationRecord> {
        if (await this.findTranslationByExternalId(entry.externalId)) {
            throw errorManager.createError(ErrorStatus.externalIdConflictError);
        }
        const record: TranslationRecord = { id: uuidv4(), ...entry, timestamp: this.store.now() };
        this.translations.push(record);
        return { ...record };
    }

    private async acquire(userId: string): Promise<void> {
        if (this.locks.has(userId)) {
            return;
        }
        await this.store.lock(userId);
        this.locks.add(userId);
    }
}

// LedgerStore kept in process memory with per-user locks and commit-time constraint checks.
export class MemoryLedgerStore implements LedgerStore {
    private readonly users = new Map<string, UserRecord>();
    private readonly wallets = new Map<string, WalletRecord>();
    private readonly transactions: TransactionRecord[] = [];
    private readonly translations: TranslationRecord[] = [];
    private readonly locks = new KeyedLock();
    private readonly lockTimeoutMs: number;
    private readonly clock: () => Date;

    constructor(options: MemoryLedgerOptions = {}) {
        this.lockTimeoutMs = options.lockTimeoutMs ?? 5000;
        this.clock = options.clock ?? (() => new Date());
    }

    // Store-assigned timestamp for new rows.
    now(): Date {
        return this.clock();
    }

    lock(userId: string): Promise<void> {
        return this.locks.acquire(userId, this.lockTimeoutMs);
    }

    async transaction<T>(work: (session: LedgerSession) => Promise<T>): Promise<T> {
        const session = new MemoryLedgerSession(this);
        try {
            const result = await work(session);
            this.commit(session);
            return result;
        } finally {
            for (const userId of session.locks) {
                this.locks.release(userId);
            }
        }
    }

    async findUserById(userId: string): Promise<UserRecord | null> {
        const user = this.users.get(userId);
        return user ? { ...user } : null;
    }

    async findUserByEmail(email: string): Promise<UserRecord | null> {
        for (const user of this.users.values()) {
            if (user.email === email) {
                return { ...user };
            }
        }
        return null;
    }

    async findWallet(userId: string): Promise<WalletRecord | null> {
        const wallet = this.wallets.get(userId);
        return wallet ? { ...wallet } : null;
    }

    async findTranslationByExternalId(externalId: string): Promise<TranslationRecord | null> {
        const entry = this.translations.find(translation => translation.externalId === externalId);
        return entry ? { ...entry } : null;
    }

    async listTransactions(query: TransactionQuery): Promise<TransactionRecord[]> {
        const matching = this.transactions.filter(entry => query.type === undefined || entry.type === query.type);
        return page(matching, query).map(entry => ({ ...entry }));
    }

    async listTranslations(query: LedgerQuery): Promise<TranslationRecord[]> {
        return page(this.translations, query).map(entry => ({ ...entry }));
    }

    committedTransactions(): TransactionRecord[] {
        return this.transactions;
    }

    committedTranslations(): TranslationRecord[] {
        return this.translations;
    }

    async close(): Promise<void> {
        this.users.clear();
        this.wallets.clear();
        this.transactions.length = 0;
        this.translations.length = 0;
    }

    // Re-checks unique constraints against rows committed meanwhile, then applies every write.
    private commit(session: MemoryLedgerSession): void {
        for (const user of session.users) {
            for (const existing of this.users.values()) {
                if (existing.email === user.email) {
                    throw errorManager.createError(ErrorStatus.userAlreadyExistsError);
                }
            }
        }
        for (const entry of session.translations) {
            if (this.translations.some(existing => existing.externalId === entry.externalId)) {
                throw errorManager.createError(ErrorStatus.externalIdConflictError);
            }
        }
        for (const userId of session.wallets.keys()) {
            if (this.wallets.has(userId)) {
                throw new LedgerConstraintError("uq_wallets_user_id", `wallet for ${userId} already exists`);
            }
        }

        for (const user of session.users) {
            this.users.set(user.id, user);
        }
        for (const [userId, wallet] of session.wallets) {
            this.wallets.set(userId, wallet);
        }
        for (const [walletId, balance] of session.balances) {
            for (const [userId, wallet] of this.wallets) {
                if (wallet.id === walletId) {
                    this.wallets.set(userId, { ...wallet, balance });
                }
            }
        }
        this.transactions.push(...session.transactions);
        this.translations.push(...session.translations);
    }
}
