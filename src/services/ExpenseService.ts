import type { ExpenseRepo } from "../storage/index.js";
import { parseIsoDate } from "../engine/index.js";
import { InvalidInputError, NotFoundError } from "../errors.js";
import type { Expense, ExpenseFilters } from "../types/index.js";

export class ExpenseService {
  private expenseRepo: ExpenseRepo;

  constructor(expenseRepo: ExpenseRepo) {
    this.expenseRepo = expenseRepo;
  }

  async createExpense(params: {
    amountCents: number;
    category: string;
    description: string;
    paymentMode: string;
    date: string;
  }): Promise<Expense> {
    if (!Number.isInteger(params.amountCents) || params.amountCents <= 0) {
      throw new InvalidInputError("Amount must be greater than 0");
    }
    if (!Number.isSafeInteger(params.amountCents)) {
      throw new InvalidInputError("Amount too large");
    }

    const category = params.category.trim();
    if (!category) {
      throw new InvalidInputError("Category is required");
    }

    const paymentMode = params.paymentMode.trim();
    if (!paymentMode) {
      throw new InvalidInputError("Payment mode is required");
    }

    const parsed = parseIsoDate(params.date);
    if (!parsed) {
      throw new InvalidInputError(`Invalid date: ${params.date}`);
    }

    return this.expenseRepo.create({
      amount: params.amountCents,
      category,
      description: params.description.trim(),
      paymentMode,
      date: params.date,
      year: parsed.year,
      month: parsed.month,
    });
  }

  async getExpense(expenseId: number): Promise<Expense> {
    const expense = await this.expenseRepo.findById(expenseId);
    if (!expense) {
      throw new NotFoundError("Expense", expenseId);
    }
    return expense;
  }

  async listExpenses(filters: ExpenseFilters = {}): Promise<Expense[]> {
    return this.expenseRepo.find(filters);
  }

  async deleteExpense(expenseId: number): Promise<Expense> {
    const expense = await this.expenseRepo.markDeleted(expenseId);
    if (!expense) {
      throw new NotFoundError("Expense", expenseId);
    }
    return expense;
  }

  async getCategories(): Promise<string[]> {
    return this.expenseRepo.distinctCategories();
  }

  async getYears(): Promise<number[]> {
    return this.expenseRepo.distinctYears();
  }
}
