import { z } from "zod";
import { parseIsoDate } from "../engine/index.js";
import { InvalidInputError } from "../errors.js";

/** Blank query-string and form values count as absent. */
function optional<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === "" ? undefined : value), schema.optional());
}

/**
 * Decimal amount (number or string, at most two decimals) to integer cents
 */
export const AmountSchema = z
  .union([z.number(), z.string()])
  .transform((val) => (typeof val === "number" ? String(val) : val.trim()))
  .pipe(z.string().regex(/^\d+(?:\.\d{1,2})?$/, "Must be a valid amount (e.g., 100 or 99.99)"))
  .transform((val) => Math.round(parseFloat(val) * 100))
  .refine((val) => val > 0, "Amount must be greater than 0")
  .refine((val) => Number.isSafeInteger(val), "Amount too large");

export const DateSchema = z
  .string()
  .trim()
  .refine((val) => parseIsoDate(val) !== null, "Invalid date (expected YYYY-MM-DD)");

const requiredText = (label: string) =>
  z.string({ required_error: `${label} is required` }).trim().min(1, `${label} is required`);

export const IdSchema = z.coerce.number().int().positive("Invalid id");

export const CreateExpenseSchema = z.object({
  amount: AmountSchema,
  category: requiredText("Category"),
  description: z.string().trim().default(""),
  paymentMode: requiredText("Payment mode"),
  date: DateSchema,
});

export const ExpenseQuerySchema = z.object({
  category: optional(z.string().trim()),
  year: optional(z.coerce.number().int().min(1).max(9999)),
  month: optional(z.coerce.number().int().min(1).max(12)),
  date: optional(DateSchema),
  sort: optional(z.enum(["newest", "oldest"])),
});

export const ParticipantsSchema = z
  .union([z.array(z.string()), z.string()])
  .transform((val) => (Array.isArray(val) ? val : val.split(",")))
  .transform((names) => names.map((n) => n.trim()).filter((n) => n.length > 0))
  .refine((names) => names.length > 0, "At least one participant is required");

export const CreateSharedExpenseSchema = z.object({
  title: requiredText("Title"),
  totalAmount: AmountSchema,
  paidBy: requiredText("Payer"),
  participants: ParticipantsSchema,
  date: DateSchema,
});

export const SharedExpenseQuerySchema = z.object({
  participant: optional(z.string().trim()),
  status: optional(z.enum(["pending", "settled"])),
  sort: optional(z.enum(["newest", "oldest"])),
});

export const SettleSchema = z.object({
  settlementDate: optional(DateSchema),
});

export const DashboardQuerySchema = z.object({
  year: optional(z.coerce.number().int().min(1).max(9999)),
});

export const BudgetSchema = z.object({
  category: requiredText("Category"),
  monthlyLimit: AmountSchema,
});

function toCamelCase(key: string): string {
  return key.replace(/_([a-z])/g, (_, ch: string) => ch.toUpperCase());
}

/**
 * Forms post snake_case field names (payment_mode, paid_by); the schemas use camelCase.
 */
export function normalizeKeys(input: unknown): unknown {
  if (typeof input !== "object" || input === null || Array.isArray(input)) {
    return input;
  }

  return Object.fromEntries(
    Object.entries(input).map(([key, value]) => [toCamelCase(key), value])
  );
}

/**
 * Parse input or throw InvalidInputError carrying the first issue's message
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(normalizeKeys(input));
  if (result.success) {
    return result.data;
  }

  const issue = result.error.errors[0];
  const field = issue?.path.join(".");
  const message = issue?.message || "Invalid input";
  throw new InvalidInputError(field ? `${field}: ${message}` : message);
}
