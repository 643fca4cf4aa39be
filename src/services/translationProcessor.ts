// Import necessary modules and types
import { v4 as uuidv4 } from "uuid";
import { LedgerSession, LedgerStore, TranslationRecord } from "../dao/ledgerStore";
import { AppError, ErrorManager, describeError, isAppError } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, TranslationLogger, WalletLogger } from "../factory/loggerFactory";
import { WalletService } from "./walletService";
import { Translator } from "./translator";

// strict: refuse when the balance is short. lenient: translate anyway and record cost null.
export type FundsPolicy = "strict" | "lenient";

export interface TranslationRequest {
    userId: string;
    inputText: string;
    sourceLang: string;
    targetLang: string;
    externalId?: string;
}

export interface TranslationOutcome {
    translationId: string;
    externalId: string | null;
    inputText: string;
    outputText: string;
    sourceLang: string;
    targetLang: string;
    cost: number | null;
    timestamp: Date;
    replayed: boolean;
}

export interface ProcessorSettings {
    costPerRequest: number;
    translateTimeoutMs: number;
    maxInputLength: number;
}

export interface NormalizedRequest {
    userId: string;
    inputText: string;
    sourceLang: string;
    targetLang: string;
    externalId?: string;
}

const LANGUAGE_CODE = /^[a-z]{2,3}(-[a-z0-9]{2,8})?$/;

function toOutcome(record: TranslationRecord, replayed: boolean): TranslationOutcome {
    return {
        translationId: record.id,
        externalId: record.externalId,
        inputText: record.inputText,
        outputText: record.outputText,
        sourceLang: record.sourceLang,
        targetLang: record.targetLang,
        cost: record.cost,
        timestamp: record.timestamp,
        replayed
    };
}

/**
 * Runs one translation request as a single unit of work: idempotency gate, wallet lock,
 * balance check, translation, debit and history record. Every entry point (synchronous HTTP,
 * queue worker) goes through {@link TranslationProcessor.process}.
 *
 * The translator is called while the wallet lock is held, so requests for the same user
 * are serialized for the duration of the translation.
 */
export class TranslationProcessor {
    private readonly errorManager: ErrorManager;
    private readonly translationLogger: TranslationLogger;
    private readonly walletLogger: WalletLogger;

    constructor(
        private readonly store: LedgerStore,
        private readonly walletService: WalletService,
        private readonly translator: Translator,
        private readonly settings: ProcessorSettings
    ) {
        this.errorManager = ErrorManager.getInstance();
        this.translationLogger = loggerFactory.createTranslationLogger();
        this.walletLogger = loggerFactory.createWalletLogger();
    }

    public async process(request: TranslationRequest, policy: FundsPolicy = "strict"): Promise<TranslationOutcome> {
        const normalized = this.validate(request);
        this.translationLogger.logRequestStarted(normalized.userId, normalized.sourceLang, normalized.targetLang, normalized.externalId);

        const outcome = await this.store.transaction(async (session) => {
            const replay = await this.findReplay(session, normalized);
            if (replay) {
                return replay;
            }

            if (!await session.findUserById(normalized.userId)) {
                throw this.errorManager.createError(ErrorStatus.userNotFoundError);
            }
            const wallet = await this.walletService.lockForUpdate(session, normalized.userId);

            // A redelivery of the same task may have committed while this call waited for the lock.
            const lateReplay = await this.findReplay(session, normalized);
            if (lateReplay) {
                return lateReplay;
            }

            const cost = this.settings.costPerRequest;
            const charge = wallet.balance >= cost ? cost : null;
            if (charge === null && policy === "strict") {
                this.walletLogger.logInsufficientFunds(normalized.userId, wallet.balance, cost);
                throw this.errorManager.createError(
                    ErrorStatus.insufficientFundsError,
                    `Insufficient credits. Required: ${cost}, current balance: ${wallet.balance}`
                );
            }

            const outputText = await this.translateWithTimeout(normalized);

            if (charge !== null) {
                await this.walletService.debit(session, wallet, charge);
                await session.appendTransaction({ userId: normalized.userId, amount: charge, type: "DEBIT" });
            }
            const record = await session.appendTranslation({
                userId: normalized.userId,
                externalId: normalized.externalId ?? uuidv4(),
                inputText: normalized.inputText,
                outputText,
                sourceLang: normalized.sourceLang,
                targetLang: normalized.targetLang,
                cost: charge
            });
            return toOutcome(record, false);
        });

        if (outcome.replayed) {
            this.translationLogger.logReplay(normalized.userId, outcome.externalId ?? "");
        } else {
            this.translationLogger.logTranslationCompleted(normalized.userId, outcome.translationId, outcome.cost);
        }
        return outcome;
    }

    // Trims and lowercases the request, rejecting bad input before any lock is taken.
    // The queued entry point calls this before publishing.
    public validate(request: TranslationRequest): NormalizedRequest {
        const inputText = request.inputText.trim();
        if (!inputText) {
            throw this.errorManager.createError(ErrorStatus.emptyInputError);
        }
        if (inputText.length > this.settings.maxInputLength) {
            throw this.errorManager.createError(
                ErrorStatus.inputTooLongError,
                `Input text exceeds ${this.settings.maxInputLength} characters`
            );
        }

        const sourceLang = request.sourceLang.trim().toLowerCase();
        const targetLang = request.targetLang.trim().toLowerCase();
        for (const code of [sourceLang, targetLang]) {
            if (!LANGUAGE_CODE.test(code)) {
                throw this.errorManager.createError(ErrorStatus.invalidLanguageCodeError, `Invalid language code: "${code}"`);
            }
        }

        const externalId = request.externalId?.trim();
        return {
            userId: request.userId,
            inputText,
            sourceLang,
            targetLang,
            externalId: externalId ? externalId : undefined
        };
    }

    // Returns the stored result for an external id that was already processed.
    private async findReplay(session: LedgerSession, request: NormalizedRequest): Promise<TranslationOutcome | null> {
        if (!request.externalId) {
            return null;
        }
        const existing = await session.findTranslationByExternalId(request.externalId);
        if (!existing) {
            return null;
        }
        if (existing.userId !== request.userId) {
            throw this.errorManager.createError(ErrorStatus.externalIdConflictError);
        }
        return toOutcome(existing, true);
    }

    // Calls the translator, aborting it once the timeout elapses.
    private async translateWithTimeout(request: NormalizedRequest): Promise<string> {
        const controller = new AbortController();
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                controller.abort();
                reject(this.errorManager.createError(
                    ErrorStatus.translationTimeoutError,
                    `Translation timed out after ${this.settings.translateTimeoutMs}ms`
                ));
            }, this.settings.translateTimeoutMs);
        });

        try {
            return await Promise.race([
                this.translator.translate(request.inputText, request.sourceLang, request.targetLang, { signal: controller.signal }),
                timeout
            ]);
        } catch (error) {
            this.translationLogger.logTranslatorFailure(request.userId, describeError(error));
            throw this.toTranslatorError(error);
        } finally {
            clearTimeout(timer);
        }
    }

    private toTranslatorError(error: unknown): AppError {
        if (isAppError(error)) {
            return error;
        }
        return this.errorManager.createError(ErrorStatus.translationFailedError, `Translation failed: ${describeError(error)}`);
    }
}
