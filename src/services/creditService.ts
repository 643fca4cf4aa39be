// Import necessary modules and types
import { LedgerStore, TransactionRecord } from "../dao/ledgerStore";
import { ErrorManager } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, WalletLogger } from "../factory/loggerFactory";
import { WalletService } from "./walletService";

export interface CreditResult {
    userId: string;
    balance: number;
    transaction: TransactionRecord;
}

// Credit grants: admin bonuses and user top-ups, each a locked credit plus a TOPUP ledger row.
export class CreditService {
    private readonly errorManager: ErrorManager;
    private readonly walletLogger: WalletLogger;

    constructor(private readonly store: LedgerStore, private readonly walletService: WalletService) {
        this.errorManager = ErrorManager.getInstance();
        this.walletLogger = loggerFactory.createWalletLogger();
    }

    // Grants bonus credits to any user on behalf of an admin.
    public async approveBonus(userId: string, amount: number): Promise<CreditResult> {
        return this.grant(userId, amount, "admin_bonus");
    }

    // Adds credits to the caller's own wallet.
    public async topUp(userId: string, amount: number): Promise<CreditResult> {
        return this.grant(userId, amount, "top_up");
    }

    private async grant(userId: string, amount: number, reason: string): Promise<CreditResult> {
        const result = await this.store.transaction(async (session) => {
            if (!await session.findUserById(userId)) {
                throw this.errorManager.createError(ErrorStatus.userNotFoundError);
            }
            const wallet = await this.walletService.lockForUpdate(session, userId);
            const credited = await this.walletService.credit(session, wallet, amount);
            const transaction = await session.appendTransaction({ userId, amount, type: "TOPUP" });
            return { userId, balance: credited.balance, transaction };
        });

        this.walletLogger.logCredit(userId, amount, result.balance, reason);
        return result;
    }
}
