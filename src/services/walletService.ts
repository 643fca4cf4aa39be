// Import necessary modules and types
import { LedgerSession, LedgerStore, MAX_LEDGER_AMOUNT, WalletRecord } from "../dao/ledgerStore";
import { ErrorManager } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, WalletLogger } from "../factory/loggerFactory";

// Race-safe balance primitives; callers append the matching ledger rows in the same unit of work.
export class WalletService {
    private readonly errorManager: ErrorManager;
    private readonly walletLogger: WalletLogger;

    constructor(private readonly store: LedgerStore) {
        this.errorManager = ErrorManager.getInstance();
        this.walletLogger = loggerFactory.createWalletLogger();
    }

    // Returns the user's wallet, creating a zero-balance one on first reference.
    public async getOrCreate(session: LedgerSession, userId: string): Promise<WalletRecord> {
        await this.ensure(session, userId);
        const wallet = await session.findWallet(userId);
        if (!wallet) {
            throw this.errorManager.createError(ErrorStatus.userNotFoundError);
        }
        return wallet;
    }

    // Takes the exclusive wallet lock for the rest of the unit of work.
    public async lockForUpdate(session: LedgerSession, userId: string): Promise<WalletRecord> {
        await this.ensure(session, userId);
        const wallet = await session.lockWallet(userId);
        if (!wallet) {
            throw this.errorManager.createError(ErrorStatus.userNotFoundError);
        }
        return wallet;
    }

    // Adds credits to a locked wallet.
    public async credit(session: LedgerSession, wallet: WalletRecord, amount: number): Promise<WalletRecord> {
        this.assertAmount(amount);
        if (wallet.balance + amount > MAX_LEDGER_AMOUNT) {
            throw this.errorManager.createError(
                ErrorStatus.invalidAmountError,
                `Balance would exceed ${MAX_LEDGER_AMOUNT} credits, current balance: ${wallet.balance}`
            );
        }
        const updated = { ...wallet, balance: wallet.balance + amount };
        await session.updateWalletBalance(wallet.id, updated.balance);
        return updated;
    }

    // Removes credits from a locked wallet, refusing to go below zero.
    public async debit(session: LedgerSession, wallet: WalletRecord, amount: number): Promise<WalletRecord> {
        this.assertAmount(amount);
        if (wallet.balance < amount) {
            this.walletLogger.logInsufficientFunds(wallet.userId, wallet.balance, amount);
            throw this.errorManager.createError(
                ErrorStatus.insufficientFundsError,
                `Insufficient credits. Required: ${amount}, current balance: ${wallet.balance}`
            );
        }
        const updated = { ...wallet, balance: wallet.balance - amount };
        await session.updateWalletBalance(wallet.id, updated.balance);
        this.walletLogger.logDebit(wallet.userId, amount, updated.balance);
        return updated;
    }

    // Reads the balance in its own unit of work.
    public async getBalance(userId: string): Promise<number> {
        const wallet = await this.store.transaction(session => this.getOrCreate(session, userId));
        this.walletLogger.logBalanceCheck(userId, wallet.balance);
        return wallet.balance;
    }

    private async ensure(session: LedgerSession, userId: string): Promise<void> {
        if (await session.ensureWallet(userId)) {
            this.walletLogger.logWalletCreated(userId);
        }
    }

    private assertAmount(amount: number): void {
        if (!Number.isSafeInteger(amount) || amount <= 0) {
            throw this.errorManager.createError(ErrorStatus.invalidAmountError, `Amount must be a positive integer, got ${amount}`);
        }
        if (amount > MAX_LEDGER_AMOUNT) {
            throw this.errorManager.createError(ErrorStatus.invalidAmountError, `Amount must not exceed ${MAX_LEDGER_AMOUNT}, got ${amount}`);
        }
    }
}
