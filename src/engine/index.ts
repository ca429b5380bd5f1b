import type { SharedExpense, Settlement, Balance } from "../types/index.js";

export * from "./dates.js";
export * from "./reports.js";

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Equal share of a shared expense, rounded to the nearest cent.
 * This is the amount every participant other than the payer owes.
 */
export function perPersonAmount(amountCents: number, participantCount: number): number {
  if (participantCount <= 0) {
    throw new Error("Cannot split among zero participants");
  }
  return Math.round(amountCents / participantCount);
}

/**
 * Per-person net balance over the given shared expenses
 * @returns Balances sorted by name (positive = owed money, negative = owes money)
 */
export function calculateBalances(expenses: SharedExpense[]): Balance[] {
  const balanceMap: Record<string, number> = {};

  for (const expense of expenses) {
    balanceMap[expense.paidBy] = balanceMap[expense.paidBy] || 0;

    // The payer's own share cancels out; everyone else moves their share to the payer
    for (const name of expense.participants) {
      if (name === expense.paidBy) continue;
      balanceMap[name] = (balanceMap[name] || 0) - expense.perPersonAmount;
      balanceMap[expense.paidBy] += expense.perPersonAmount;
    }
  }

  return Object.entries(balanceMap)
    .map(([userId, balance]) => ({ userId, balance }))
    .sort((a, b) => compareNames(a.userId, b.userId));
}

/**
 * Who owes whom, one entry per pair of people.
 * Every participant other than the payer owes the payer the stored per-person share;
 * debts running both ways between the same two people are netted against each other.
 * @returns Settlements with amount > 0, sorted by debtor then creditor
 */
export function calculatePairwiseBalances(expenses: SharedExpense[]): Settlement[] {
  const owed = new Map<string, Map<string, number>>();

  const add = (from: string, to: string, amount: number) => {
    const row = owed.get(from) ?? new Map<string, number>();
    row.set(to, (row.get(to) ?? 0) + amount);
    owed.set(from, row);
  };

  for (const expense of expenses) {
    for (const name of expense.participants) {
      if (name !== expense.paidBy) {
        add(name, expense.paidBy, expense.perPersonAmount);
      }
    }
  }

  const settlements: Settlement[] = [];
  const seen = new Set<string>();

  for (const [from, row] of owed) {
    for (const [to, amount] of row) {
      const key = from < to ? `${from}\u0000${to}` : `${to}\u0000${from}`;
      if (seen.has(key)) continue;
      seen.add(key);

      const net = amount - (owed.get(to)?.get(from) ?? 0);
      if (net > 0) {
        settlements.push({ from, to, amount: net });
      } else if (net < 0) {
        settlements.push({ from: to, to: from, amount: -net });
      }
    }
  }

  return settlements.sort(
    (a, b) => compareNames(a.from, b.from) || compareNames(a.to, b.to)
  );
}

/**
 * Simplify debts to minimize number of transactions (greedy algorithm)
 * @param balances - Array of balances
 * @returns Array of settlements needed to settle all debts
 */
export function simplifyDebts(balances: Balance[]): Settlement[] {
  // Create working copy
  const workingBalances = balances.map((b) => ({ ...b }));
  const settlements: Settlement[] = [];

  if (workingBalances.length === 0) {
    return settlements;
  }

  while (true) {
    // Find max creditor (person owed the most)
    const maxCreditor = workingBalances.reduce((max, b) =>
      b.balance > max.balance ? b : max
    );

    // Find max debtor (person who owes the most)
    const maxDebtor = workingBalances.reduce((min, b) =>
      b.balance < min.balance ? b : min
    );

    const settleAmount = Math.min(maxCreditor.balance, -maxDebtor.balance);

    if (settleAmount <= 0) {
      break;
    }

    settlements.push({
      from: maxDebtor.userId,
      to: maxCreditor.userId,
      amount: settleAmount,
    });

    maxCreditor.balance -= settleAmount;
    maxDebtor.balance += settleAmount;
  }

  return settlements;
}
