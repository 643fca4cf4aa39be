// Record shapes and the unit-of-work contract shared by every ledger backend.

export type TransactionType = "TOPUP" | "DEBIT";

// Largest balance or amount the ledger columns hold (Postgres INTEGER).
export const MAX_LEDGER_AMOUNT = 2147483647;

export interface UserRecord {
    id: string;
    email: string;
    passwordHash: string;
    isAdmin: boolean;
    createdAt: Date;
}

export interface WalletRecord {
    id: string;
    userId: string;
    balance: number;
}

export interface TransactionRecord {
    id: string;
    userId: string;
    amount: number;
    type: TransactionType;
    timestamp: Date;
}

export interface TranslationRecord {
    id: string;
    userId: string;
    externalId: string | null;
    inputText: string;
    outputText: string;
    sourceLang: string;
    targetLang: string;
    cost: number | null;
    timestamp: Date;
}

export interface NewUser {
    email: string;
    passwordHash: string;
    isAdmin?: boolean;
}

export interface NewTransaction {
    userId: string;
    amount: number;
    type: TransactionType;
}

export interface NewTranslation {
    userId: string;
    externalId: string;
    inputText: string;
    outputText: string;
    sourceLang: string;
    targetLang: string;
    cost: number | null;
}

// Filters for history listings; results are always newest first.
export interface LedgerQuery {
    userId?: string;
    from?: Date;
    to?: Date;
    offset: number;
    limit: number;
}

export interface TransactionQuery extends LedgerQuery {
    type?: TransactionType;
}

// Reads that need no lock and may run outside a unit of work.
export interface LedgerReader {
    findUserById(userId: string): Promise<UserRecord | null>;
    findUserByEmail(email: string): Promise<UserRecord | null>;
    findWallet(userId: string): Promise<WalletRecord | null>;
    findTranslationByExternalId(externalId: string): Promise<TranslationRecord | null>;
    listTransactions(query: TransactionQuery): Promise<TransactionRecord[]>;
    listTranslations(query: LedgerQuery): Promise<TranslationRecord[]>;
}

// Operations available inside one unit of work.
export interface LedgerSession extends LedgerReader {
    insertUser(user: NewUser): Promise<UserRecord>;
    // Creates a zero-balance wallet unless one exists; concurrent callers never both insert.
    ensureWallet(userId: string): Promise<boolean>;
    // Exclusive lock on the user's wallet until the unit of work ends.
    lockWallet(userId: string): Promise<WalletRecord | null>;
    updateWalletBalance(walletId: string, balance: number): Promise<void>;
    appendTransaction(entry: NewTransaction): Promise<TransactionRecord>;
    appendTranslation(entry: NewTranslation): Promise<TranslationRecord>;
}

export interface LedgerStore extends LedgerReader {
    // Runs work atomically: commits when it resolves, rolls back when it rejects.
    transaction<T>(work: (session: LedgerSession) => Promise<T>): Promise<T>;
    close(): Promise<void>;
}

// Raised when a write would break a storage-level check constraint.
export class LedgerConstraintError extends Error {
    constructor(public readonly constraint: string, detail: string) {
        super(`Constraint ${constraint} violated: ${detail}`);
        this.name = "LedgerConstraintError";
    }
}
