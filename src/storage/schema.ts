import { sqliteTable, text, integer } from "drizzle-orm/sqlite-core";

export const expenses = sqliteTable("expenses", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  amount: integer("amount").notNull(), // cents
  category: text("category").notNull(),
  description: text("description").notNull().default(""),
  paymentMode: text("payment_mode").notNull(),
  date: text("date").notNull(), // YYYY-MM-DD
  year: integer("year").notNull(),
  month: integer("month").notNull(),
  status: text("status", { enum: ["active", "deleted"] }).notNull().default("active"),
  createdAt: integer("created_at", { mode: "timestamp" }).notNull(),
});

export const sharedExpenses = sqliteTable("shared_expenses", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  title: text("title").notNull(),
  totalAmount: integer("total_amount").notNull(), // cents
  paidBy: text("paid_by").notNull(),
  participants: text("participants", { mode: "json" }).$type<string[]>().notNull(),
  perPersonAmount: integer("per_person_amount").notNull(), // cents
  date: text("date").notNull(),
  status: text("status", { enum: ["pending", "settled"] }).notNull().default("pending"),
  settledOn: text("settled_on"),
  createdAt: integer("created_at", { mode: "timestamp" }).notNull(),
});

export const budgets = sqliteTable("budgets", {
  category: text("category").primaryKey(),
  monthlyLimit: integer("monthly_limit").notNull(), // cents
  updatedAt: integer("updated_at", { mode: "timestamp" }).notNull(),
});
