// Adapter for an external translation service reached over HTTP.
import axios from "axios";
import { ErrorManager, isAppError } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";
import { loggerFactory, ErrorRouteLogger } from "../factory/loggerFactory";
import { TranslateOptions, Translator } from "./translator";

// Request body sent to the translation service
interface TranslateRequest {
    text: string;
    sourceLang: string;
    targetLang: string;
}

// Response from the translation service
interface TranslateResponse {
    translatedText?: unknown;
    error?: unknown;
}

export interface HttpTranslatorOptions {
    serviceUrl: string;
    timeoutMs: number;
}

// HttpTranslator forwards translation calls and maps service failures onto domain errors.
export class HttpTranslator implements Translator {
    private readonly errorManager: ErrorManager;
    private readonly errorLogger: ErrorRouteLogger;

    constructor(private readonly options: HttpTranslatorOptions) {
        this.errorManager = ErrorManager.getInstance();
        this.errorLogger = loggerFactory.createErrorLogger();
    }

    public async translate(text: string, sourceLang: string, targetLang: string, options?: TranslateOptions): Promise<string> {
        const request: TranslateRequest = { text, sourceLang, targetLang };

        try {
            const response = await axios.post<TranslateResponse>(
                `${this.options.serviceUrl.replace(/\/+$/, "")}/translate`,
                request,
                {
                    timeout: this.options.timeoutMs,
                    signal: options?.signal,
                    headers: { "Content-Type": "application/json" }
                }
            );

            const translated = response.data.translatedText;
            if (typeof translated !== "string") {
                const reason = typeof response.data.error === "string" ? response.data.error : "Malformed translation response";
                throw this.errorManager.createError(ErrorStatus.translationFailedError, reason);
            }
            return translated;
        } catch (error) {
            if (isAppError(error)) {
                throw error;
            }
            throw this.mapAxiosError(error, sourceLang, targetLang);
        }
    }

    // Differentiates rejected pairs, timeouts and other failures.
    private mapAxiosError(error: unknown, sourceLang: string, targetLang: string): Error {
        if (!axios.isAxiosError(error)) {
            const message = error instanceof Error ? error.message : "Unknown error";
            this.errorLogger.logDatabaseError("TRANSLATOR_REQUEST", "translation_service", message);
            return this.errorManager.createError(ErrorStatus.translationFailedError, `Translation failed: ${message}`);
        }

        if (error.response) {
            const status = error.response.status;
            this.errorLogger.logDatabaseError("TRANSLATOR_HTTP_ERROR", "translation_service", `Status: ${status}, Message: ${error.message}`);
            if (status === 400 || status === 422) {
                return this.errorManager.createError(
                    ErrorStatus.unsupportedLanguagePairError,
                    `Unsupported language pair: ${sourceLang} -> ${targetLang}`
                );
            }
            return this.errorManager.createError(ErrorStatus.translationFailedError, `Translation service responded with status ${status}`);
        }

        if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT" || error.code === "ERR_CANCELED") {
            this.errorLogger.logDatabaseError("TRANSLATOR_TIMEOUT", "translation_service", error.message);
            return this.errorManager.createError(ErrorStatus.translationTimeoutError);
        }

        this.errorLogger.logDatabaseError("TRANSLATOR_NETWORK_ERROR", "translation_service", error.message);
        return this.errorManager.createError(ErrorStatus.translationFailedError, `Translation service unreachable: ${error.message}`);
    }
}
