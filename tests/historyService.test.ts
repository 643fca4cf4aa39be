import { MemoryLedgerStore } from "../src/dao/memoryLedgerStore";
import { HistoryService } from "../src/services/historyService";
import { ErrorStatus } from "../src/factory/status";
import { buildLedger, DEFAULT_SETTINGS, seedUser, steppingClock, Ledger } from "./helpers";

describe("History Service Suite", () => {
  let ledger: Ledger;
  let history: HistoryService;

  beforeEach(() => {
    ledger = buildLedger(undefined, DEFAULT_SETTINGS, new MemoryLedgerStore({ clock: steppingClock() }));
    history = new HistoryService(ledger.store, { defaultLimit: 2, maxLimit: 3, adminMaxLimit: 5 });
  });

  it("should page a user's own translations newest first", async () => {
    const user = await seedUser(ledger.store, "h@x.com");
    const other = await seedUser(ledger.store, "o@x.com");
    await ledger.creditService.topUp(user.id, 3);
    await ledger.creditService.topUp(other.id, 1);
    for (const word of ["red", "green", "blue"]) {
      await ledger.processor.process({ userId: user.id, inputText: word, sourceLang: "en", targetLang: "fr" });
    }
    await ledger.processor.process({ userId: other.id, inputText: "cat", sourceLang: "en", targetLang: "fr" });

    const firstPage = await history.listTranslations(user.id, {});
    expect(firstPage.map(entry => entry.outputText)).toEqual(["bleu", "vert"]);

    const secondPage = await history.listTranslations(user.id, { skip: 2, limit: 2 });
    expect(secondPage.map(entry => entry.outputText)).toEqual(["rouge"]);
  });

  it("should list a user's ledger entries", async () => {
    const user = await seedUser(ledger.store, "t@x.com");
    await ledger.creditService.topUp(user.id, 2);
    await ledger.processor.process({ userId: user.id, inputText: "dog", sourceLang: "en", targetLang: "fr" });

    const entries = await history.listTransactions(user.id, { limit: 3 });
    expect(entries.map(entry => [entry.type, entry.amount])).toEqual([["DEBIT", 1], ["TOPUP", 2]]);
  });

  it.each([
    [{ skip: -1 }, "skip must be an integer >= 0"],
    [{ limit: 0 }, "limit must be an integer between 1 and 3"],
    [{ limit: 4 }, "limit must be an integer between 1 and 3"]
  ])("should reject the page %p", async (page, message) => {
    await expect(history.listTransactions("any", page)).rejects.toMatchObject({
      errorType: ErrorStatus.invalidPaginationError,
      message
    });
  });

  it("should allow admins the larger ceiling and filter by user and type", async () => {
    const a = await seedUser(ledger.store, "a@x.com");
    const b = await seedUser(ledger.store, "b@x.com");
    await ledger.creditService.topUp(a.id, 1);
    await ledger.creditService.approveBonus(b.id, 4);
    await ledger.processor.process({ userId: b.id, inputText: "yes", sourceLang: "en", targetLang: "fr" });

    const all = await history.viewTransactions({ limit: 5 });
    expect(all).toHaveLength(3);

    const bTopups = await history.viewTransactions({ userId: b.id, type: "TOPUP" });
    expect(bTopups.map(entry => entry.amount)).toEqual([4]);

    const translations = await history.viewTranslations({ userId: b.id });
    expect(translations.map(entry => entry.outputText)).toEqual(["oui"]);
  });

  it("should filter admin views by time range", async () => {
    const user = await seedUser(ledger.store, "range@x.com");
    await ledger.creditService.topUp(user.id, 1);
    const [entry] = await history.viewTransactions({});

    const inside = await history.viewTransactions({ from: entry.timestamp, to: entry.timestamp });
    expect(inside).toHaveLength(1);

    const after = await history.viewTransactions({ from: new Date(entry.timestamp.getTime() + 1) });
    expect(after).toHaveLength(0);
  });

  it("should reject a range that ends before it starts", async () => {
    await expect(history.viewTranslations({ from: new Date("2024-02-01"), to: new Date("2024-01-01") }))
      .rejects.toMatchObject({ errorType: ErrorStatus.invalidPaginationError, message: "from must not be later than to" });
  });
});
