import { MemoryLedgerStore } from "../src/dao/memoryLedgerStore";
import { UserRecord } from "../src/dao/ledgerStore";
import { WalletService } from "../src/services/walletService";
import { CreditService } from "../src/services/creditService";
import { TranslationProcessor, ProcessorSettings } from "../src/services/translationProcessor";
import { DictionaryTranslator, Translator } from "../src/services/translator";

export const DEFAULT_SETTINGS: ProcessorSettings = {
  costPerRequest: 1,
  translateTimeoutMs: 1000,
  maxInputLength: 5000
};

// Inserts a user with an empty wallet, bypassing password hashing.
export async function seedUser(store: MemoryLedgerStore, email: string, isAdmin = false): Promise<UserRecord> {
  return store.transaction(async (session) => {
    const user = await session.insertUser({ email, passwordHash: "not-a-real-hash", isAdmin });
    await session.ensureWallet(user.id);
    return user;
  });
}

// Clock that advances one second per reading, starting at a fixed instant.
export function steppingClock(start = Date.UTC(2024, 0, 1)): () => Date {
  let tick = 0;
  return () => new Date(start + 1000 * tick++);
}

export interface Ledger {
  store: MemoryLedgerStore;
  walletService: WalletService;
  creditService: CreditService;
  processor: TranslationProcessor;
}

export function buildLedger(
  translator: Translator = new DictionaryTranslator(),
  settings: ProcessorSettings = DEFAULT_SETTINGS,
  store: MemoryLedgerStore = new MemoryLedgerStore({ lockTimeoutMs: 1000 })
): Ledger {
  const walletService = new WalletService(store);
  return {
    store,
    walletService,
    creditService: new CreditService(store, walletService),
    processor: new TranslationProcessor(store, walletService, translator, settings)
  };
}
