export { openDatabase, type Database, type DB } from "./db.js";
export * from "./schema.js";
export { ExpenseRepo, type NewExpense } from "./repos/ExpenseRepo.js";
export { SharedExpenseRepo, type NewSharedExpense } from "./repos/SharedExpenseRepo.js";
export { BudgetRepo } from "./repos/BudgetRepo.js";
