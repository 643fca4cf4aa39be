// Client-facing shapes of ledger records; password hashes never leave the service.
import { TransactionRecord, TranslationRecord, UserRecord } from "../dao/ledgerStore";

export function publicUser(user: UserRecord) {
    return { id: user.id, email: user.email, isAdmin: user.isAdmin, createdAt: user.createdAt };
}

export function publicTransaction(entry: TransactionRecord) {
    return { id: entry.id, userId: entry.userId, amount: entry.amount, type: entry.type, timestamp: entry.timestamp };
}

export function publicTranslation(entry: TranslationRecord) {
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
