import type { SharedExpenseRepo } from "../storage/index.js";
import {
  calculateBalances,
  calculatePairwiseBalances,
  simplifyDebts,
} from "../engine/index.js";
import type { Balance, Settlement } from "../types/index.js";

export class BalanceService {
  private sharedExpenseRepo: SharedExpenseRepo;

  constructor(sharedExpenseRepo: SharedExpenseRepo) {
    this.sharedExpenseRepo = sharedExpenseRepo;
  }

  /** Who owes whom across all unsettled shared expenses, one entry per pair. */
  async getBalances(): Promise<Settlement[]> {
    const pending = await this.sharedExpenseRepo.findPending();
    return calculatePairwiseBalances(pending);
  }

  async getNetBalances(): Promise<Balance[]> {
    const pending = await this.sharedExpenseRepo.findPending();
    return calculateBalances(pending);
  }

  async getSettleUp(): Promise<Settlement[]> {
    const balances = await this.getNetBalances();
    return simplifyDebts(balances);
  }
}
