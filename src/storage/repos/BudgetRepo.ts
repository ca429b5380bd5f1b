import { asc } from "drizzle-orm";
import type { DB } from "../db.js";
import { budgets } from "../schema.js";
import type { Budget } from "../../types/index.js";

export class BudgetRepo {
  private db: DB;

  constructor(db: DB) {
    this.db = db;
  }

  async upsert(category: string, monthlyLimit: number): Promise<Budget> {
    const now = new Date();

    await this.db
      .insert(budgets)
      .values({ category, monthlyLimit, updatedAt: now })
      .onConflictDoUpdate({
        target: budgets.category,
        set: { monthlyLimit, updatedAt: now },
      });

    return { category, monthlyLimit, updatedAt: now };
  }

  async findAll(): Promise<Budget[]> {
    return this.db.select().from(budgets).orderBy(asc(budgets.category));
  }
}
