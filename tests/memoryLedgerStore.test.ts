import { MemoryLedgerStore } from "../src/dao/memoryLedgerStore";
import { LedgerConstraintError } from "../src/dao/ledgerStore";
import { ErrorStatus } from "../src/factory/status";
import { seedUser, steppingClock } from "./helpers";

describe("Memory Ledger Store Suite", () => {
  let store: MemoryLedgerStore;

  beforeEach(() => {
    store = new MemoryLedgerStore({ lockTimeoutMs: 50, clock: steppingClock() });
  });

  describe("users", () => {
    it("should reject a second user with the same email", async () => {
      await seedUser(store, "a@x.com");

      await expect(seedUser(store, "a@x.com")).rejects.toMatchObject({
        errorType: ErrorStatus.userAlreadyExistsError,
        status: 409
      });
    });

    it("should let only one of two concurrent registrations commit", async () => {
      const results = await Promise.allSettled([seedUser(store, "race@x.com"), seedUser(store, "race@x.com")]);

      expect(results.filter(result => result.status === "fulfilled")).toHaveLength(1);
      const rejected = results.find(result => result.status === "rejected");
      expect(rejected).toMatchObject({ reason: { errorType: ErrorStatus.userAlreadyExistsError } });
    });

    it("should discard every write when the unit of work fails", async () => {
      await expect(store.transaction(async (session) => {
        await session.insertUser({ email: "gone@x.com", passwordHash: "hash" });
        throw new Error("boom");
      })).rejects.toThrow("boom");

      expect(await store.findUserByEmail("gone@x.com")).toBeNull();
    });
  });

  describe("wallets", () => {
    it("should create a wallet once and report whether it did", async () => {
      const user = await store.transaction(session => session.insertUser({ email: "w@x.com", passwordHash: "hash" }));

      expect(await store.transaction(session => session.ensureWallet(user.id))).toBe(true);
      expect(await store.transaction(session => session.ensureWallet(user.id))).toBe(false);
      expect(await store.findWallet(user.id)).toMatchObject({ userId: user.id, balance: 0 });
    });

    it("should refuse a wallet for an unknown user", async () => {
      await expect(store.transaction(session => session.ensureWallet("00000000-0000-4000-8000-000000000000")))
        .rejects.toMatchObject({ errorType: ErrorStatus.userNotFoundError });
    });

    it("should reject a negative balance", async () => {
      const user = await seedUser(store, "neg@x.com");

      await expect(store.transaction(async (session) => {
        const wallet = await session.lockWallet(user.id);
        await session.updateWalletBalance(wallet ? wallet.id : "", -1);
      })).rejects.toBeInstanceOf(LedgerConstraintError);
      expect((await store.findWallet(user.id))?.balance).toBe(0);
    });

    it("should name the range constraint for a balance above the ledger maximum", async () => {
      const user = await seedUser(store, "over@x.com");

      await expect(store.transaction(async (session) => {
        const wallet = await session.lockWallet(user.id);
        await session.updateWalletBalance(wallet ? wallet.id : "", 2147483648);
      })).rejects.toMatchObject({ constraint: "wallets_balance_range" });
    });

    it("should time out a second locker while the wallet is held", async () => {
      const user = await seedUser(store, "lock@x.com");
      let release: () => void = () => undefined;
      const gate = new Promise<void>(resolve => { release = resolve; });

      const holder = store.transaction(async (session) => {
        await session.lockWallet(user.id);
        await gate;
      });
      await new Promise(resolve => setImmediate(resolve));

      await expect(store.transaction(session => session.lockWallet(user.id))).rejects.toMatchObject({
        errorType: ErrorStatus.walletLockTimeoutError,
        retryable: true
      });

      release();
      await holder;
      await expect(store.transaction(session => session.lockWallet(user.id))).resolves.toMatchObject({ userId: user.id });
    });
  });

  describe("ledger rows", () => {
    it("should reject a non-positive transaction amount", async () => {
      const user = await seedUser(store, "amt@x.com");

      await expect(store.transaction(session => session.appendTransaction({ userId: user.id, amount: 0, type: "TOPUP" })))
        .rejects.toBeInstanceOf(LedgerConstraintError);
      expect(store.committedTransactions()).toHaveLength(0);
    });

    it("should list transactions newest first with offset and limit", async () => {
      const user = await seedUser(store, "list@x.com");
      for (const amount of [1, 2, 3]) {
        await store.transaction(session => session.appendTransaction({ userId: user.id, amount, type: "TOPUP" }));
      }

      const page = await store.listTransactions({ userId: user.id, offset: 0, limit: 2 });
      expect(page.map(entry => entry.amount)).toEqual([3, 2]);

      const next = await store.listTransactions({ userId: user.id, offset: 2, limit: 2 });
      expect(next.map(entry => entry.amount)).toEqual([1]);
    });

    it("should filter transactions by type", async () => {
      const user = await seedUser(store, "type@x.com");
      await store.transaction(session => session.appendTransaction({ userId: user.id, amount: 5, type: "TOPUP" }));
      await store.transaction(session => session.appendTransaction({ userId: user.id, amount: 1, type: "DEBIT" }));

      const debits = await store.listTransactions({ type: "DEBIT", offset: 0, limit: 10 });
      expect(debits).toHaveLength(1);
      expect(debits[0]).toMatchObject({ amount: 1, type: "DEBIT" });
    });

    it("should keep external ids unique", async () => {
      const user = await seedUser(store, "ext@x.com");
      const translation = {
        userId: user.id,
        externalId: "T1",
        inputText: "hello",
        outputText: "bonjour",
        sourceLang: "en",
        targetLang: "fr",
        cost: 1
      };
      await store.transaction(session => session.appendTranslation(translation));

      await expect(store.transaction(session => session.appendTranslation(translation)))
        .rejects.toMatchObject({ errorType: ErrorStatus.externalIdConflictError });
    });

    it("should hand out copies of uncommitted translations", async () => {
      const user = await seedUser(store, "copy@x.com");

      const reread = await store.transaction(async (session) => {
        await session.appendTranslation({
          userId: user.id,
          externalId: "T2",
          inputText: "cat",
          outputText: "chat",
          sourceLang: "en",
          targetLang: "fr",
          cost: 1
        });
        const first = await session.findTranslationByExternalId("T2");
        if (first) {
          first.outputText = "changed";
        }
        return session.findTranslationByExternalId("T2");
      });

      expect(reread?.outputText).toBe("chat");
      expect((await store.findTranslationByExternalId("T2"))?.outputText).toBe("chat");
    });
  });
});
