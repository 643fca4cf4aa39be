import { ErrorStatus } from "../src/factory/status";
import { buildLedger, seedUser, Ledger } from "./helpers";

describe("Credit Service Suite", () => {
  let ledger: Ledger;

  beforeEach(() => {
    ledger = buildLedger();
  });

  it("should credit a top-up and record a TOPUP transaction", async () => {
    const user = await seedUser(ledger.store, "top@x.com");

    const result = await ledger.creditService.topUp(user.id, 10);

    expect(result.balance).toBe(10);
    expect(result.transaction).toMatchObject({ userId: user.id, amount: 10, type: "TOPUP" });
    expect(await ledger.walletService.getBalance(user.id)).toBe(10);
  });

  it("should add admin bonuses on top of the current balance", async () => {
    const user = await seedUser(ledger.store, "bonus@x.com");
    await ledger.creditService.topUp(user.id, 5);

    const result = await ledger.creditService.approveBonus(user.id, 20);

    expect(result.balance).toBe(25);
    expect(ledger.store.committedTransactions().map(entry => entry.amount)).toEqual([5, 20]);
  });

  it("should create the wallet of a user who has none yet", async () => {
    const user = await ledger.store.transaction(session => session.insertUser({ email: "nowallet@x.com", passwordHash: "hash" }));

    await expect(ledger.creditService.approveBonus(user.id, 3)).resolves.toMatchObject({ balance: 3 });
  });

  it("should not lose credits under concurrent grants", async () => {
    const user = await seedUser(ledger.store, "many@x.com");

    await Promise.all(Array.from({ length: 10 }, () => ledger.creditService.topUp(user.id, 2)));

    expect(await ledger.walletService.getBalance(user.id)).toBe(20);
    expect(ledger.store.committedTransactions()).toHaveLength(10);
  });

  it.each([0, -5])("should reject the amount %p without writing anything", async (amount) => {
    const user = await seedUser(ledger.store, "bad@x.com");

    await expect(ledger.creditService.topUp(user.id, amount)).rejects.toMatchObject({ errorType: ErrorStatus.invalidAmountError });
    expect(ledger.store.committedTransactions()).toHaveLength(0);
  });

  it("should refuse a grant to an unknown user", async () => {
    await expect(ledger.creditService.approveBonus("00000000-0000-4000-8000-000000000000", 5))
      .rejects.toMatchObject({ errorType: ErrorStatus.userNotFoundError, status: 404 });
  });
});
