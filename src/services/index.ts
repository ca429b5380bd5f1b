import {
  BudgetRepo,
  ExpenseRepo,
  SharedExpenseRepo,
  type DB,
} from "../storage/index.js";
import { BalanceService } from "./BalanceService.js";
import { BudgetService } from "./BudgetService.js";
import { ExpenseService } from "./ExpenseService.js";
import { ReportService } from "./ReportService.js";
import { SharedExpenseService } from "./SharedExpenseService.js";

export { BalanceService, BudgetService, ExpenseService, ReportService, SharedExpenseService };

export interface Services {
  expenses: ExpenseService;
  sharedExpenses: SharedExpenseService;
  balances: BalanceService;
  reports: ReportService;
  budgets: BudgetService;
}

export function createServices(db: DB, now: () => Date = () => new Date()): Services {
  const expenseRepo = new ExpenseRepo(db);
  const sharedExpenseRepo = new SharedExpenseRepo(db);
  const budgetRepo = new BudgetRepo(db);

  return {
    expenses: new ExpenseService(expenseRepo),
    sharedExpenses: new SharedExpenseService(sharedExpenseRepo, now),
    balances: new BalanceService(sharedExpenseRepo),
    reports: new ReportService(expenseRepo, budgetRepo, now),
    budgets: new BudgetService(budgetRepo),
  };
}
