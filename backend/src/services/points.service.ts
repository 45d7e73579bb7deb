import type { Expense, ExpenseCategory } from "../types/expense";

export const CATEGORY_MULTIPLIERS: Readonly<Record<ExpenseCategory, number>> = {
  food: 1,
  transport: 1,
  entertainment: 1,
  shopping: 1,
  bills: 1,
  healthcare: 2,
  education: 2,
  other: 1,
};

/** One point per whole currency unit, scaled by the category multiplier. */
export function pointsFor(entry: Pick<Expense, "amount_cents" | "category">): number {
  const units = Math.floor(Math.max(0, entry.amount_cents) / 100);
  return units * CATEGORY_MULTIPLIERS[entry.category];
}

export type LedgerReplay = (userId: string) => AsyncIterable<Expense>;

export interface PointsService {
  pointsFor(entry: Pick<Expense, "amount_cents" | "category">): number;
  balance(userId: string): Promise<number>;
  invalidate(userId: string): void;
}

/**
 * Balances are derived by replaying the ledger and cached per user. A
 * generation counter keeps a replay that raced with a mutation from
 * being cached.
 */
export function createPointsService(replay: LedgerReplay): PointsService {
  const cache = new Map<string, number>();
  const generations = new Map<string, number>();

  return {
    pointsFor,

    async balance(userId) {
      const cached = cache.get(userId);
      if (cached !== undefined) {
        return cached;
      }

      const generation = generations.get(userId) ?? 0;

      let total = 0;
      for await (const entry of replay(userId)) {
        total += pointsFor(entry);
      }

      if ((generations.get(userId) ?? 0) === generation) {
        cache.set(userId, total);
      }

      return total;
    },

    invalidate(userId) {
      cache.delete(userId);
      generations.set(userId, (generations.get(userId) ?? 0) + 1);
    },
  };
}
