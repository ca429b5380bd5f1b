import { describe, it, expect } from "vitest";
import { calculateBalances, calculatePairwiseBalances } from "../../src/engine/index.js";
import { pendingShared } from "../helpers/fixtures.js";

describe("calculateBalances", () => {
  it("should credit the payer and debit every participant's share", () => {
    const balances = calculateBalances([pendingShared(3000, "alice", ["alice", "bob", "charlie"])]);

    // Alice paid 3000 and owes 1000, so balance = +2000
    expect(balances).toEqual([
      { userId: "alice", balance: 2000 },
      { userId: "bob", balance: -1000 },
      { userId: "charlie", balance: -1000 },
    ]);
  });

  it("should combine multiple payers", () => {
    const balances = calculateBalances([
      pendingShared(3000, "alice", ["alice", "bob"]),
      pendingShared(2000, "bob", ["alice", "bob"]),
    ]);

    // Alice: paid 3000, owes 1500 + 1000 = +500
    expect(balances).toEqual([
      { userId: "alice", balance: 500 },
      { userId: "bob", balance: -500 },
    ]);
  });

  it("should credit a payer who is not a participant with the whole amount", () => {
    const balances = calculateBalances([pendingShared(1000, "alice", ["bob", "charlie"])]);

    expect(balances).toEqual([
      { userId: "alice", balance: 1000 },
      { userId: "bob", balance: -500 },
      { userId: "charlie", balance: -500 },
    ]);
  });

  it("should return empty array for no expenses", () => {
    expect(calculateBalances([])).toEqual([]);
  });
});

describe("calculatePairwiseBalances", () => {
  it("should make every other participant owe the payer their share", () => {
    const result = calculatePairwiseBalances([pendingShared(3000, "A", ["A", "B", "C"])]);

    expect(result).toEqual([
      { from: "B", to: "A", amount: 1000 },
      { from: "C", to: "A", amount: 1000 },
    ]);
  });

  it("should never list a payer owing themself", () => {
    const result = calculatePairwiseBalances([pendingShared(3000, "A", ["A", "B", "C"])]);
    expect(result.some((s) => s.from === s.to)).toBe(false);
  });

  it("should net debts running both ways between two people", () => {
    const result = calculatePairwiseBalances([
      pendingShared(3000, "alice", ["alice", "bob"]),
      pendingShared(2000, "bob", ["alice", "bob"]),
    ]);

    // bob owes 1500, alice owes 1000
    expect(result).toEqual([{ from: "bob", to: "alice", amount: 500 }]);
  });

  it("should drop pairs whose debts cancel out", () => {
    const result = calculatePairwiseBalances([
      pendingShared(2000, "alice", ["alice", "bob"]),
      pendingShared(2000, "bob", ["alice", "bob"]),
    ]);

    expect(result).toEqual([]);
  });

  it("should charge the stored per-person share, rounded to the cent", () => {
    const dinner = pendingShared(1000, "a", ["a", "b", "c"]);
    expect(dinner.perPersonAmount).toBe(333);

    expect(calculatePairwiseBalances([dinner])).toEqual([
      { from: "b", to: "a", amount: 333 },
      { from: "c", to: "a", amount: 333 },
    ]);
    expect(calculateBalances([dinner])).toEqual([
      { userId: "a", balance: 666 },
      { userId: "b", balance: -333 },
      { userId: "c", balance: -333 },
    ]);
  });

  it("should be independent of expense order", () => {
    const first = pendingShared(3000, "A", ["A", "B", "C"]);
    const second = pendingShared(1200, "B", ["A", "B"]);

    expect(calculatePairwiseBalances([first, second])).toEqual(
      calculatePairwiseBalances([second, first])
    );
    expect(calculatePairwiseBalances([first, second])).toEqual([
      { from: "B", to: "A", amount: 400 },
      { from: "C", to: "A", amount: 1000 },
    ]);
  });
});
