import type { BudgetRepo } from "../storage/index.js";
import { InvalidInputError } from "../errors.js";
import type { Budget } from "../types/index.js";

export class BudgetService {
  private budgetRepo: BudgetRepo;

  constructor(budgetRepo: BudgetRepo) {
    this.budgetRepo = budgetRepo;
  }

  async setBudget(category: string, monthlyLimitCents: number): Promise<Budget> {
    const name = category.trim();
    if (!name) {
      throw new InvalidInputError("Category is required");
    }
    if (!Number.isInteger(monthlyLimitCents) || monthlyLimitCents <= 0) {
      throw new InvalidInputError("Monthly limit must be greater than 0");
    }
    if (!Number.isSafeInteger(monthlyLimitCents)) {
      throw new InvalidInputError("Monthly limit too large");
    }

    return this.budgetRepo.upsert(name, monthlyLimitCents);
  }

  async listBudgets(): Promise<Budget[]> {
    return this.budgetRepo.findAll();
  }
}
