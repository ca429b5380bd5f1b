import { describe, it, expect } from "vitest";
import { simplifyDebts } from "../../src/engine/index.js";
import type { Balance } from "../../src/types/index.js";

describe("simplifyDebts", () => {
  it("should simplify A->B->C chain into A->C", () => {
    const balances: Balance[] = [
      { userId: "alice", balance: -1000 }, // Owes 1000
      { userId: "bob", balance: 0 }, // Even
      { userId: "charlie", balance: 1000 }, // Owed 1000
    ];

    expect(simplifyDebts(balances)).toEqual([{ from: "alice", to: "charlie", amount: 1000 }]);
  });

  it("should handle two-person simple debt", () => {
    const balances: Balance[] = [
      { userId: "alice", balance: 1000 },
      { userId: "bob", balance: -1000 },
    ];

    expect(simplifyDebts(balances)).toEqual([{ from: "bob", to: "alice", amount: 1000 }]);
  });

  it("should pay the largest debtor out first", () => {
    const balances: Balance[] = [
      { userId: "alice", balance: 1000 },
      { userId: "bob", balance: -500 },
      { userId: "charlie", balance: -300 },
      { userId: "dave", balance: -200 },
    ];

    expect(simplifyDebts(balances)).toEqual([
      { from: "bob", to: "alice", amount: 500 },
      { from: "charlie", to: "alice", amount: 300 },
      { from: "dave", to: "alice", amount: 200 },
    ]);
  });

  it("should clear every balance with multiple creditors and debtors", () => {
    const finalBalances: Record<string, number> = {
      alice: 500,
      bob: 300,
      charlie: -400,
      dave: -200,
      eve: -200,
    };
    const balances: Balance[] = Object.entries(finalBalances).map(([userId, balance]) => ({
      userId,
      balance,
    }));

    const settlements = simplifyDebts(balances);

    for (const settlement of settlements) {
      finalBalances[settlement.from] += settlement.amount;
      finalBalances[settlement.to] -= settlement.amount;
    }

    expect(Object.values(finalBalances).every((b) => b === 0)).toBe(true);
    expect(settlements.length).toBeLessThanOrEqual(4);
  });

  it("should return empty array when already settled", () => {
    const balances: Balance[] = [
      { userId: "alice", balance: 0 },
      { userId: "bob", balance: 0 },
    ];

    expect(simplifyDebts(balances)).toEqual([]);
  });

  it("should return empty array for no balances", () => {
    expect(simplifyDebts([])).toEqual([]);
  });
});
