import express, {
  type ErrorRequestHandler,
  type Express,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from "express";
import { AppError } from "../errors.js";
import type { Services } from "../services/index.js";
import {
  BudgetSchema,
  CreateExpenseSchema,
  CreateSharedExpenseSchema,
  DashboardQuerySchema,
  ExpenseQuerySchema,
  IdSchema,
  SettleSchema,
  SharedExpenseQuerySchema,
  parseInput,
} from "./validation.js";

export interface AppOptions {
  logRequests?: boolean;
}

// Express 4 does not forward rejected promises to the error handler
function route(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  if (err instanceof AppError) {
    res.status(err.status).json({ error: err.code, message: err.message });
    return;
  }

  // body-parser tags its malformed-JSON SyntaxError with this type
  if (err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed") {
    res.status(400).json({ error: "INVALID_INPUT", message: "Malformed request body" });
    return;
  }

  console.error(`Unhandled error on ${req.method} ${req.originalUrl}:`, err);
  res.status(500).json({ error: "INTERNAL", message: "Something went wrong" });
};

export function createApp(services: Services, options: AppOptions = {}): Express {
  const app = express();

  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  if (options.logRequests) {
    app.use((req, res, next) => {
      const started = Date.now();
      res.on("finish", () => {
        console.log(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - started}ms`);
      });
      next();
    });
  }

  // Health check
  app.get("/health", (req, res) => {
    res.json({ status: "ok" });
  });

  // GET /dashboard - Aggregated metrics and chart data
  app.get(
    "/dashboard",
    route(async (req, res) => {
      const { year } = parseInput(DashboardQuerySchema, req.query);
      res.json(await services.reports.getDashboard(year));
    })
  );

  // GET /expenses - Filtered list of active expenses
  app.get(
    "/expenses",
    route(async (req, res) => {
      const filters = parseInput(ExpenseQuerySchema, req.query);
      const [expenses, categories, years] = await Promise.all([
        services.expenses.listExpenses(filters),
        services.expenses.getCategories(),
        services.expenses.getYears(),
      ]);
      res.json({ expenses, categories, years, selected: { ...filters, sort: filters.sort ?? "newest" } });
    })
  );

  // POST /expenses - Record an expense
  app.post(
    "/expenses",
    route(async (req, res) => {
      const input = parseInput(CreateExpenseSchema, req.body);
      const expense = await services.expenses.createExpense({
        amountCents: input.amount,
        category: input.category,
        description: input.description,
        paymentMode: input.paymentMode,
        date: input.date,
      });
      res.status(201).json(expense);
    })
  );

  app.get(
    "/expenses/:id",
    route(async (req, res) => {
      const id = parseInput(IdSchema, req.params.id);
      res.json(await services.expenses.getExpense(id));
    })
  );

  // POST /expenses/:id/delete - Soft delete
  app.post(
    "/expenses/:id/delete",
    route(async (req, res) => {
      const id = parseInput(IdSchema, req.params.id);
      res.json(await services.expenses.deleteExpense(id));
    })
  );

  // GET /shared-expenses - List shared expenses
  app.get(
    "/shared-expenses",
    route(async (req, res) => {
      const filters = parseInput(SharedExpenseQuerySchema, req.query);
      const [expenses, participants] = await Promise.all([
        services.sharedExpenses.listSharedExpenses(filters),
        services.sharedExpenses.getParticipants(),
      ]);
      res.json({ expenses, participants, selected: { ...filters, sort: filters.sort ?? "newest" } });
    })
  );

  // POST /shared-expenses - Record a shared expense split equally
  app.post(
    "/shared-expenses",
    route(async (req, res) => {
      const input = parseInput(CreateSharedExpenseSchema, req.body);
      const expense = await services.sharedExpenses.createSharedExpense({
        title: input.title,
        totalAmountCents: input.totalAmount,
        paidBy: input.paidBy,
        participants: input.participants,
        date: input.date,
      });
      res.status(201).json(expense);
    })
  );

  // GET /shared-expenses/balances - Net balances per pair of participants
  app.get(
    "/shared-expenses/balances",
    route(async (req, res) => {
      const [balances, net, settleUp] = await Promise.all([
        services.balances.getBalances(),
        services.balances.getNetBalances(),
        services.balances.getSettleUp(),
      ]);
      res.json({ balances, net, settleUp });
    })
  );

  app.get(
    "/shared-expenses/:id",
    route(async (req, res) => {
      const id = parseInput(IdSchema, req.params.id);
      res.json(await services.sharedExpenses.getSharedExpense(id));
    })
  );

  // POST /shared-expenses/:id/settle - Mark as settled
  app.post(
    "/shared-expenses/:id/settle",
    route(async (req, res) => {
      const id = parseInput(IdSchema, req.params.id);
      const { settlementDate } = parseInput(SettleSchema, req.body ?? {});
      res.json(await services.sharedExpenses.settle(id, settlementDate));
    })
  );

  // GET /budgets - Monthly category budgets
  app.get(
    "/budgets",
    route(async (req, res) => {
      res.json(await services.budgets.listBudgets());
    })
  );

  // POST /budgets - Create or replace a category budget
  app.post(
    "/budgets",
    route(async (req, res) => {
      const input = parseInput(BudgetSchema, req.body);
      res.status(201).json(await services.budgets.setBudget(input.category, input.monthlyLimit));
    })
  );

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      error: "Not Found",
      message: `No route for ${req.method} ${req.path}`,
    });
  });

  app.use(errorHandler);

  return app;
}
