import { and, asc, desc, eq, type SQL } from "drizzle-orm";
import type { DB } from "../db.js";
import { expenses } from "../schema.js";
import type { Expense, ExpenseFilters } from "../../types/index.js";

type ExpenseRow = typeof expenses.$inferSelect;

function toExpense(row: ExpenseRow): Expense {
  return {
    id: row.id,
    amount: row.amount,
    category: row.category,
    description: row.description,
    paymentMode: row.paymentMode,
    date: row.date,
    status: row.status,
    createdAt: row.createdAt,
  };
}

export interface NewExpense {
  amount: number;
  category: string;
  description: string;
  paymentMode: string;
  date: string;
  year: number;
  month: number;
}

export class ExpenseRepo {
  private db: DB;

  constructor(db: DB) {
    this.db = db;
  }

  async create(expense: NewExpense): Promise<Expense> {
    const [row] = await this.db
      .insert(expenses)
      .values({
        ...expense,
        status: "active",
        createdAt: new Date(),
      })
      .returning();

    return toExpense(row);
  }

  async findById(id: number): Promise<Expense | null> {
    const row = await this.db.select().from(expenses).where(eq(expenses.id, id)).get();

    if (!row) return null;

    return toExpense(row);
  }

  async find(filters: ExpenseFilters = {}): Promise<Expense[]> {
    const conditions: SQL[] = [];

    if (!filters.includeDeleted) conditions.push(eq(expenses.status, "active"));
    if (filters.category !== undefined) conditions.push(eq(expenses.category, filters.category));
    if (filters.year !== undefined) conditions.push(eq(expenses.year, filters.year));
    if (filters.month !== undefined) conditions.push(eq(expenses.month, filters.month));
    if (filters.date !== undefined) conditions.push(eq(expenses.date, filters.date));

    const dateOrder = filters.sort === "oldest" ? asc(expenses.date) : desc(expenses.date);

    const rows = await this.db
      .select()
      .from(expenses)
      .where(and(...conditions))
      .orderBy(dateOrder, asc(expenses.id));

    return rows.map(toExpense);
  }

  async markDeleted(id: number): Promise<Expense | null> {
    const [row] = await this.db
      .update(expenses)
      .set({ status: "deleted" })
      .where(eq(expenses.id, id))
      .returning();

    return row ? toExpense(row) : null;
  }

  async distinctCategories(): Promise<string[]> {
    const rows = await this.db
      .selectDistinct({ category: expenses.category })
      .from(expenses)
      .where(eq(expenses.status, "active"))
      .orderBy(asc(expenses.category));

    return rows.map((r) => r.category);
  }

  async distinctYears(): Promise<number[]> {
    const rows = await this.db
      .selectDistinct({ year: expenses.year })
      .from(expenses)
      .where(eq(expenses.status, "active"))
      .orderBy(asc(expenses.year));

    return rows.map((r) => r.year);
  }
}
