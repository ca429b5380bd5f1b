// All amounts are in INTEGER CENTS, all dates are "YYYY-MM-DD"
export type ExpenseStatus = "active" | "deleted";
export type SharedExpenseStatus = "pending" | "settled";
export type SortOrder = "newest" | "oldest";

export interface Expense {
  id: number;
  amount: number; // cents
  category: string;
  description: string;
  paymentMode: string;
  date: string;
  status: ExpenseStatus;
  createdAt: Date;
}

export interface ExpenseFilters {
  category?: string;
  year?: number;
  month?: number; // 1-12
  date?: string;
  sort?: SortOrder;
  includeDeleted?: boolean;
}

export type SharedExpense = {
  id: number;
  title: string;
  totalAmount: number; // cents
  paidBy: string;
  participants: string[];
  perPersonAmount: number; // cents, rounded equal share
  date: string;
  createdAt: Date;
} & (
  | { status: "pending"; settledOn: null }
  | { status: "settled"; settledOn: string }
);

export interface SharedExpenseFilters {
  participant?: string;
  status?: SharedExpenseStatus;
  sort?: SortOrder;
}

export interface Budget {
  category: string;
  monthlyLimit: number; // cents
  updatedAt: Date;
}

export interface Settlement {
  from: string;
  to: string;
  amount: number; // cents
}

export interface Balance {
  userId: string;
  balance: number; // positive = owed money, negative = owes money (cents)
}

export interface ChartData {
  labels: string[];
  values: number[];
}

export interface MonthTotal {
  month: number; // 1-12
  name: string;
  total: number;
}

export interface CategoryTotal {
  category: string;
  total: number;
}

export interface BudgetAlert {
  category: string;
  limit: number;
  spent: number;
}

export interface Dashboard {
  year: number;
  monthName: string;
  monthlyTotal: number | null;
  yearlyTotal: number;
  averageMonthlySpend: number;
  highestMonth: MonthTotal | null;
  topCategory: CategoryTotal | null;
  monthlyBreakdown: MonthTotal[];
  monthlyChart: ChartData;
  categoryChart: ChartData;
  availableYears: number[];
  budgetAlerts: BudgetAlert[];
}
