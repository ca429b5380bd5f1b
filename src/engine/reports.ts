import type {
  Budget,
  BudgetAlert,
  CategoryTotal,
  ChartData,
  Expense,
  MonthTotal,
} from "../types/index.js";
import { monthName, parseIsoDate } from "./dates.js";

// Every function here works on whatever it is given; callers pass active expenses only.

function yearMonthOf(expense: Expense): { year: number; month: number } | null {
  const parsed = parseIsoDate(expense.date);
  return parsed ? { year: parsed.year, month: parsed.month } : null;
}

function sumAmounts(expenses: Expense[]): number {
  return expenses.reduce((sum, e) => sum + e.amount, 0);
}

export function monthlyTotal(expenses: Expense[], year: number, month: number): number {
  return sumAmounts(
    expenses.filter((e) => {
      const ym = yearMonthOf(e);
      return ym !== null && ym.year === year && ym.month === month;
    })
  );
}

export function yearlyTotal(expenses: Expense[], year: number): number {
  return sumAmounts(expenses.filter((e) => yearMonthOf(e)?.year === year));
}

/** Totals for months 1..12 of `year`, zero where nothing was spent. */
export function monthlyTotals(expenses: Expense[], year: number): MonthTotal[] {
  const totals = Array.from({ length: 12 }, (_, i) => ({
    month: i + 1,
    name: monthName(i + 1),
    total: 0,
  }));

  for (const expense of expenses) {
    const ym = yearMonthOf(expense);
    if (ym && ym.year === year) {
      totals[ym.month - 1].total += expense.amount;
    }
  }

  return totals;
}

/**
 * Yearly total divided by the number of months that have at least one expense,
 * so a partial year is not diluted by empty months. Rounded to the cent.
 */
export function averageMonthlySpend(expenses: Expense[], year: number): number {
  const activeMonths = new Set<number>();
  let total = 0;

  for (const expense of expenses) {
    const ym = yearMonthOf(expense);
    if (ym && ym.year === year) {
      activeMonths.add(ym.month);
      total += expense.amount;
    }
  }

  return activeMonths.size === 0 ? 0 : Math.round(total / activeMonths.size);
}

/**
 * Month with the largest total; the earliest month wins a tie.
 * Months after `throughMonth` are ignored.
 */
export function highestSpendingMonth(
  expenses: Expense[],
  year: number,
  throughMonth = 12
): MonthTotal | null {
  const counted = new Set<number>();
  for (const expense of expenses) {
    const ym = yearMonthOf(expense);
    if (ym && ym.year === year) counted.add(ym.month);
  }

  let best: MonthTotal | null = null;
  for (const entry of monthlyTotals(expenses, year)) {
    if (entry.month > throughMonth || !counted.has(entry.month)) continue;
    if (best === null || entry.total > best.total) {
      best = entry;
    }
  }

  return best;
}

export function categoryTotals(
  expenses: Expense[],
  window: { year?: number; month?: number } = {}
): CategoryTotal[] {
  const totals = new Map<string, number>();

  for (const expense of expenses) {
    const ym = yearMonthOf(expense);
    if (window.year !== undefined && ym?.year !== window.year) continue;
    if (window.month !== undefined && ym?.month !== window.month) continue;
    totals.set(expense.category, (totals.get(expense.category) ?? 0) + expense.amount);
  }

  return Array.from(totals, ([category, total]) => ({ category, total })).sort((a, b) =>
    a.category < b.category ? -1 : a.category > b.category ? 1 : 0
  );
}

/** Category with the largest total; alphabetical order breaks ties. */
export function highestSpendingCategory(
  expenses: Expense[],
  window: { year?: number } = {}
): CategoryTotal | null {
  let best: CategoryTotal | null = null;

  // categoryTotals is sorted by name, so a strict comparison keeps the first name
  for (const entry of categoryTotals(expenses, window)) {
    if (best === null || entry.total > best.total) {
      best = entry;
    }
  }

  return best;
}

export function budgetAlerts(
  expenses: Expense[],
  budgets: Budget[],
  year: number,
  month: number
): BudgetAlert[] {
  const spentByCategory = new Map(
    categoryTotals(expenses, { year, month }).map((c) => [c.category, c.total])
  );

  return budgets
    .map((b) => ({
      category: b.category,
      limit: b.monthlyLimit,
      spent: spentByCategory.get(b.category) ?? 0,
    }))
    .filter((alert) => alert.spent > alert.limit);
}

export function toChartData<T>(
  entries: T[],
  label: (entry: T) => string,
  value: (entry: T) => number
): ChartData {
  return {
    labels: entries.map(label),
    values: entries.map(value),
  };
}
