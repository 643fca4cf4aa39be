// Import necessary modules and types
import { LedgerReader, TransactionRecord, TransactionType, TranslationRecord } from "../dao/ledgerStore";
import { HistoryConfig } from "../config/appConfig";
import { ErrorManager } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";

export interface PageRequest {
    skip?: number;
    limit?: number;
}

export interface AdminFilter extends PageRequest {
    userId?: string;
    type?: TransactionType;
    from?: Date;
    to?: Date;
}

// Paginated, newest-first views over the ledger for users and admins.
export class HistoryService {
    private readonly errorManager = ErrorManager.getInstance();

    constructor(private readonly reader: LedgerReader, private readonly settings: HistoryConfig) {}

    // Lists the user's own translations.
    public async listTranslations(userId: string, page: PageRequest): Promise<TranslationRecord[]> {
        const { offset, limit } = this.checkPage(page, this.settings.maxLimit);
        return this.reader.listTranslations({ userId, offset, limit });
    }

    // Lists the user's own ledger entries.
    public async listTransactions(userId: string, page: PageRequest): Promise<TransactionRecord[]> {
        const { offset, limit } = this.checkPage(page, this.settings.maxLimit);
        return this.reader.listTransactions({ userId, offset, limit });
    }

    // Admin view over every user's ledger entries.
    public async viewTransactions(filter: AdminFilter): Promise<TransactionRecord[]> {
        const { offset, limit } = this.checkPage(filter, this.settings.adminMaxLimit);
        this.checkRange(filter);
        return this.reader.listTransactions({ userId: filter.userId, type: filter.type, from: filter.from, to: filter.to, offset, limit });
    }

    // Admin view over every user's translations.
    public async viewTranslations(filter: AdminFilter): Promise<TranslationRecord[]> {
        const { offset, limit } = this.checkPage(filter, this.settings.adminMaxLimit);
        this.checkRange(filter);
        return this.reader.listTranslations({ userId: filter.userId, from: filter.from, to: filter.to, offset, limit });
    }

    private checkPage(page: PageRequest, ceiling: number): { offset: number; limit: number } {
        const offset = page.skip ?? 0;
        const limit = page.limit ?? Math.min(this.settings.defaultLimit, ceiling);
        if (!Number.isSafeInteger(offset) || offset < 0) {
            throw this.errorManager.createError(ErrorStatus.invalidPaginationError, "skip must be an integer >= 0");
        }
        if (!Number.isSafeInteger(limit) || limit < 1 || limit > ceiling) {
            throw this.errorManager.createError(ErrorStatus.invalidPaginationError, `limit must be an integer between 1 and ${ceiling}`);
        }
        return { offset, limit };
    }

    private checkRange(filter: AdminFilter): void {
        if (filter.from && filter.to && filter.from > filter.to) {
            throw this.errorManager.createError(ErrorStatus.invalidPaginationError, "from must not be later than to");
        }
    }
}
