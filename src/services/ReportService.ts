import type { BudgetRepo, ExpenseRepo } from "../storage/index.js";
import {
  averageMonthlySpend,
  budgetAlerts,
  categoryTotals,
  highestSpendingCategory,
  highestSpendingMonth,
  monthName,
  monthlyTotal,
  monthlyTotals,
  toChartData,
  yearlyTotal,
} from "../engine/index.js";
import { InvalidInputError } from "../errors.js";
import type {
  BudgetAlert,
  CategoryTotal,
  Dashboard,
  MonthTotal,
} from "../types/index.js";

function assertYear(year: number): void {
  if (!Number.isInteger(year) || year < 1 || year > 9999) {
    throw new InvalidInputError(`Invalid year: ${year}`);
  }
}

function assertMonth(month: number): void {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new InvalidInputError(`Invalid month: ${month}`);
  }
}

/**
 * Dashboard metrics. Reads active expenses only and aggregates in memory.
 */
export class ReportService {
  private expenseRepo: ExpenseRepo;
  private budgetRepo: BudgetRepo;
  private now: () => Date;

  constructor(expenseRepo: ExpenseRepo, budgetRepo: BudgetRepo, now: () => Date = () => new Date()) {
    this.expenseRepo = expenseRepo;
    this.budgetRepo = budgetRepo;
    this.now = now;
  }

  async getMonthlyTotal(year: number, month: number): Promise<number> {
    assertYear(year);
    assertMonth(month);
    const expenses = await this.expenseRepo.find({ year, month });
    return monthlyTotal(expenses, year, month);
  }

  async getYearlyTotal(year: number): Promise<number> {
    assertYear(year);
    const expenses = await this.expenseRepo.find({ year });
    return yearlyTotal(expenses, year);
  }

  async getAverageMonthlySpend(year: number): Promise<number> {
    assertYear(year);
    const expenses = await this.expenseRepo.find({ year });
    return averageMonthlySpend(expenses, year);
  }

  async getHighestSpendingMonth(year: number): Promise<MonthTotal | null> {
    assertYear(year);
    const expenses = await this.expenseRepo.find({ year });
    return highestSpendingMonth(expenses, year);
  }

  /** Across all time unless a year is given. */
  async getHighestSpendingCategory(year?: number): Promise<CategoryTotal | null> {
    if (year !== undefined) assertYear(year);
    const expenses = await this.expenseRepo.find(year === undefined ? {} : { year });
    return highestSpendingCategory(expenses, { year });
  }

  async getCategoryTotals(window: { year?: number; month?: number } = {}): Promise<CategoryTotal[]> {
    if (window.year !== undefined) assertYear(window.year);
    if (window.month !== undefined) assertMonth(window.month);
    const expenses = await this.expenseRepo.find(window);
    return categoryTotals(expenses, window);
  }

  /**
   * Zero-filled month totals; the current year stops at the current month.
   */
  async getMonthlyBreakdown(year: number): Promise<MonthTotal[]> {
    assertYear(year);
    const expenses = await this.expenseRepo.find({ year });
    return monthlyTotals(expenses, year).slice(0, this.monthsToShow(year));
  }

  async getBudgetAlerts(year: number, month: number): Promise<BudgetAlert[]> {
    assertYear(year);
    assertMonth(month);
    const [expenses, budgets] = await Promise.all([
      this.expenseRepo.find({ year, month }),
      this.budgetRepo.findAll(),
    ]);
    return budgetAlerts(expenses, budgets, year, month);
  }

  async getDashboard(requestedYear?: number): Promise<Dashboard> {
    const today = this.now();
    const currentYear = today.getFullYear();
    const currentMonth = today.getMonth() + 1;

    const year = requestedYear ?? currentYear;
    assertYear(year);

    const month = year === currentYear ? currentMonth : null;

    const [expenses, budgets, availableYears] = await Promise.all([
      this.expenseRepo.find({ year }),
      this.budgetRepo.findAll(),
      this.expenseRepo.distinctYears(),
    ]);

    const shownMonths = this.monthsToShow(year);
    const breakdown = monthlyTotals(expenses, year).slice(0, shownMonths);
    const categories = categoryTotals(expenses, { year });

    return {
      year,
      monthName: month === null ? "Full Year" : monthName(month),
      monthlyTotal: month === null ? null : monthlyTotal(expenses, year, month),
      yearlyTotal: yearlyTotal(expenses, year),
      averageMonthlySpend: averageMonthlySpend(expenses, year),
      highestMonth: highestSpendingMonth(expenses, year, shownMonths),
      topCategory: highestSpendingCategory(expenses, { year }),
      monthlyBreakdown: breakdown,
      monthlyChart: toChartData(breakdown, (m) => m.name, (m) => m.total),
      categoryChart: toChartData(categories, (c) => c.category, (c) => c.total),
      availableYears,
      budgetAlerts: month === null ? [] : budgetAlerts(expenses, budgets, year, month),
    };
  }

  private monthsToShow(year: number): number {
    const today = this.now();
    return year === today.getFullYear() ? today.getMonth() + 1 : 12;
  }
}
