// Import the bundled word lists and error factories.
import dictionary from "../data/dictionary.json";
import { ErrorManager } from "../factory/errorManager";
import { ErrorStatus } from "../factory/status";

export interface TranslateOptions {
    signal?: AbortSignal;
}

// Maps text between languages. Implementations have no side effects on the ledger.
export interface Translator {
    translate(text: string, sourceLang: string, targetLang: string, options?: TranslateOptions): Promise<string>;
}

type WordList = Record<string, string>;

// Keeps the leading capital of the source word.
function matchCase(source: string, translated: string): string {
    const first = source.charAt(0);
    if (first !== first.toLowerCase() && first === first.toUpperCase()) {
        return translated.charAt(0).toUpperCase() + translated.slice(1);
    }
    return translated;
}

// Word-by-word lookup translator over a fixed set of language pairs.
export class DictionaryTranslator implements Translator {
    private readonly pairs: Map<string, WordList>;
    private readonly errorManager = ErrorManager.getInstance();

    constructor(pairs: Record<string, WordList> = dictionary) {
        this.pairs = new Map(Object.entries(pairs));
    }

    // Language pairs this translator accepts, as "src-tgt".
    public supportedPairs(): string[] {
        return [...this.pairs.keys()];
    }

    public async translate(text: string, sourceLang: string, targetLang: string, options?: TranslateOptions): Promise<string> {
        const words = this.pairs.get(`${sourceLang}-${targetLang}`);
        if (!words) {
            throw this.errorManager.createError(
                ErrorStatus.unsupportedLanguagePairError,
                `Unsupported language pair: ${sourceLang} -> ${targetLang}`
            );
        }
        if (options?.signal?.aborted) {
            throw this.errorManager.createError(ErrorStatus.translationTimeoutError);
        }

        let known = 0;
        const output = text.replace(/[\p{L}']+/gu, (word) => {
            const translated = words[word.toLowerCase()];
            if (translated === undefined) {
                return word;
            }
            known += 1;
            return matchCase(word, translated);
        });

        return known > 0 ? output : `[${targetLang}] ${text}`;
    }
}
