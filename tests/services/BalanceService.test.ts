import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { openDatabase, type Database } from "../../src/storage/index.js";
import { createServices, type Services } from "../../src/services/index.js";

describe("BalanceService", () => {
  let database: Database;
  let services: Services;

  const add = (totalAmountCents: number, paidBy: string, participants: string[]) =>
    services.sharedExpenses.createSharedExpense({
      title: "Trip",
      totalAmountCents,
      paidBy,
      participants,
      date: "2024-06-01",
    });

  beforeEach(() => {
    database = openDatabase(":memory:");
    services = createServices(database.db);
  });

  afterEach(() => {
    database.close();
  });

  it("should make B and C owe A their shares of 30", async () => {
    await add(3000, "A", ["A", "B", "C"]);

    expect(await services.balances.getBalances()).toEqual([
      { from: "B", to: "A", amount: 1000 },
      { from: "C", to: "A", amount: 1000 },
    ]);
  });

  it("should charge the stored rounded share", async () => {
    const expense = await add(1000, "A", ["A", "B", "C"]);
    expect(expense.perPersonAmount).toBe(333);

    expect(await services.balances.getBalances()).toEqual([
      { from: "B", to: "A", amount: 333 },
      { from: "C", to: "A", amount: 333 },
    ]);
    expect(await services.balances.getNetBalances()).toEqual([
      { userId: "A", balance: 666 },
      { userId: "B", balance: -333 },
      { userId: "C", balance: -333 },
    ]);
  });

  it("should net pairs and report per-person balances", async () => {
    await add(3000, "A", ["A", "B", "C"]);
    await add(1200, "B", ["A", "B"]);

    expect(await services.balances.getBalances()).toEqual([
      { from: "B", to: "A", amount: 400 },
      { from: "C", to: "A", amount: 1000 },
    ]);

    expect(await services.balances.getNetBalances()).toEqual([
      { userId: "A", balance: 1400 },
      { userId: "B", balance: -400 },
      { userId: "C", balance: -1000 },
    ]);

    expect(await services.balances.getSettleUp()).toEqual([
      { from: "C", to: "A", amount: 1000 },
      { from: "B", to: "A", amount: 400 },
    ]);
  });

  it("should ignore settled expenses", async () => {
    const trip = await add(3000, "A", ["A", "B", "C"]);
    await add(1200, "B", ["A", "B"]);
    await services.sharedExpenses.settle(trip.id, "2024-06-02");

    expect(await services.balances.getBalances()).toEqual([{ from: "A", to: "B", amount: 600 }]);
  });

  it("should be empty with nothing pending", async () => {
    expect(await services.balances.getBalances()).toEqual([]);
    expect(await services.balances.getSettleUp()).toEqual([]);
  });
});
