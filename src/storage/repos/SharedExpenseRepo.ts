import { and, asc, desc, eq, sql, type SQL } from "drizzle-orm";
import type { DB } from "../db.js";
import { sharedExpenses } from "../schema.js";
import type { SharedExpense, SharedExpenseFilters } from "../../types/index.js";

type SharedExpenseRow = typeof sharedExpenses.$inferSelect;

function toSharedExpense(row: SharedExpenseRow): SharedExpense {
  const base = {
    id: row.id,
    title: row.title,
    totalAmount: row.totalAmount,
    paidBy: row.paidBy,
    participants: row.participants,
    perPersonAmount: row.perPersonAmount,
    date: row.date,
    createdAt: row.createdAt,
  };

  if (row.status === "settled" && row.settledOn !== null) {
    return { ...base, status: "settled", settledOn: row.settledOn };
  }

  return { ...base, status: "pending", settledOn: null };
}

export interface NewSharedExpense {
  title: string;
  totalAmount: number;
  paidBy: string;
  participants: string[];
  perPersonAmount: number;
  date: string;
}

export class SharedExpenseRepo {
  private db: DB;

  constructor(db: DB) {
    this.db = db;
  }

  async create(expense: NewSharedExpense): Promise<SharedExpense> {
    const [row] = await this.db
      .insert(sharedExpenses)
      .values({
        ...expense,
        status: "pending",
        settledOn: null,
        createdAt: new Date(),
      })
      .returning();

    return toSharedExpense(row);
  }

  async findById(id: number): Promise<SharedExpense | null> {
    const row = await this.db
      .select()
      .from(sharedExpenses)
      .where(eq(sharedExpenses.id, id))
      .get();

    if (!row) return null;

    return toSharedExpense(row);
  }

  async find(filters: SharedExpenseFilters = {}): Promise<SharedExpense[]> {
    const conditions: SQL[] = [];

    if (filters.status !== undefined) {
      conditions.push(eq(sharedExpenses.status, filters.status));
    }
    if (filters.participant !== undefined) {
      conditions.push(
        sql`exists (select 1 from json_each(${sharedExpenses.participants}) where json_each.value = ${filters.participant})`
      );
    }

    // Order of entry: creation time, then id for rows created in the same second
    const order =
      filters.sort === "oldest"
        ? [asc(sharedExpenses.createdAt), asc(sharedExpenses.id)]
        : [desc(sharedExpenses.createdAt), desc(sharedExpenses.id)];

    const rows = await this.db
      .select()
      .from(sharedExpenses)
      .where(and(...conditions))
      .orderBy(...order);

    return rows.map(toSharedExpense);
  }

  async findPending(): Promise<SharedExpense[]> {
    const rows = await this.db
      .select()
      .from(sharedExpenses)
      .where(eq(sharedExpenses.status, "pending"))
      .orderBy(asc(sharedExpenses.id));

    return rows.map(toSharedExpense);
  }

  /**
   * Flip a pending expense to settled.
   * Returns null when no pending row matched (missing, or settled already).
   */
  async markSettled(id: number, settledOn: string): Promise<SharedExpense | null> {
    const [row] = await this.db
      .update(sharedExpenses)
      .set({ status: "settled", settledOn })
      .where(and(eq(sharedExpenses.id, id), eq(sharedExpenses.status, "pending")))
      .returning();

    return row ? toSharedExpense(row) : null;
  }

  async distinctParticipants(): Promise<string[]> {
    const rows = await this.db.all<{ name: string }>(
      sql`select distinct json_each.value as name from ${sharedExpenses}, json_each(${sharedExpenses.participants}) order by name`
    );

    return rows.map((r) => r.name);
  }
}
