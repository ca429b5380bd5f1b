import type { SharedExpenseRepo } from "../storage/index.js";
import { parseIsoDate, perPersonAmount, toIsoDate } from "../engine/index.js";
import { AlreadySettledError, InvalidInputError, NotFoundError } from "../errors.js";
import type { SharedExpense, SharedExpenseFilters } from "../types/index.js";

export class SharedExpenseService {
  private sharedExpenseRepo: SharedExpenseRepo;
  private now: () => Date;

  constructor(sharedExpenseRepo: SharedExpenseRepo, now: () => Date = () => new Date()) {
    this.sharedExpenseRepo = sharedExpenseRepo;
    this.now = now;
  }

  async createSharedExpense(params: {
    title: string;
    totalAmountCents: number;
    paidBy: string;
    participants: string[];
    date: string;
  }): Promise<SharedExpense> {
    const title = params.title.trim();
    if (!title) {
      throw new InvalidInputError("Title is required");
    }

    if (!Number.isInteger(params.totalAmountCents) || params.totalAmountCents <= 0) {
      throw new InvalidInputError("Total amount must be greater than 0");
    }
    if (!Number.isSafeInteger(params.totalAmountCents)) {
      throw new InvalidInputError("Total amount too large");
    }

    const paidBy = params.paidBy.trim();
    if (!paidBy) {
      throw new InvalidInputError("Payer is required");
    }

    const named = params.participants.map((p) => p.trim()).filter((p) => p.length > 0);
    if (named.length === 0) {
      throw new InvalidInputError("At least one participant is required");
    }

    // The payer always takes a share and comes first; names are a set
    const participants = Array.from(new Set([paidBy, ...named]));

    if (!parseIsoDate(params.date)) {
      throw new InvalidInputError(`Invalid date: ${params.date}`);
    }

    return this.sharedExpenseRepo.create({
      title,
      totalAmount: params.totalAmountCents,
      paidBy,
      participants,
      perPersonAmount: perPersonAmount(params.totalAmountCents, participants.length),
      date: params.date,
    });
  }

  async getSharedExpense(id: number): Promise<SharedExpense> {
    const expense = await this.sharedExpenseRepo.findById(id);
    if (!expense) {
      throw new NotFoundError("Shared expense", id);
    }
    return expense;
  }

  async listSharedExpenses(filters: SharedExpenseFilters = {}): Promise<SharedExpense[]> {
    return this.sharedExpenseRepo.find(filters);
  }

  async getParticipants(): Promise<string[]> {
    return this.sharedExpenseRepo.distinctParticipants();
  }

  async settle(id: number, settlementDate?: string): Promise<SharedExpense> {
    const settledOn = settlementDate ?? toIsoDate(this.now());
    if (!parseIsoDate(settledOn)) {
      throw new InvalidInputError(`Invalid settlement date: ${settledOn}`);
    }

    const existing = await this.getSharedExpense(id);
    if (existing.status === "settled") {
      throw new AlreadySettledError(id);
    }

    const settled = await this.sharedExpenseRepo.markSettled(id, settledOn);
    if (!settled) {
      // Another request settled it between the read and the update
      throw new AlreadySettledError(id);
    }

    return settled;
  }
}
