import type { SharedExpense } from "../../src/types/index.js";

let nextId = 1;

export function pendingShared(
  totalAmount: number,
  paidBy: string,
  participants: string[]
): SharedExpense {
  return {
    id: nextId++,
    title: "Shared",
    totalAmount,
    paidBy,
    participants,
    perPersonAmount: Math.round(totalAmount / participants.length),
    date: "2024-01-01",
    createdAt: new Date(),
    status: "pending",
    settledOn: null,
  };
}
