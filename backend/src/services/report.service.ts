import type { Expense, ExpenseCategory } from "../types/expense";
import { fromCents } from "../utils/money";
import { pointsFor } from "./points.service";

const MAX_MONTHS = 12;

export interface ReportRange {
  from?: Date;
  to?: Date;
}

export interface CategoryTotal {
  category: ExpenseCategory;
  total: number;
  count: number;
}

export interface MonthTotal {
  month: string;
  total: number;
  count: number;
}

export interface SpendingSummary {
  from: Date | null;
  to: Date | null;
  totalSpent: number;
  count: number;
  points: number;
  byCategory: CategoryTotal[];
  byMonth: MonthTotal[];
}

export type RangeReplay = (userId: string, range: ReportRange) => AsyncIterable<Expense>;

export interface ReportService {
  summary(userId: string, range?: ReportRange): Promise<SpendingSummary>;
}

function monthKey(date: Date): string {
  return date.toISOString().slice(0, 7);
}

function bump<K>(totals: Map<K, { cents: number; count: number }>, key: K, cents: number) {
  const current = totals.get(key) ?? { cents: 0, count: 0 };
  totals.set(key, { cents: current.cents + cents, count: current.count + 1 });
}

export function summarize(entries: Iterable<Expense>, range: ReportRange = {}): SpendingSummary {
  const byCategory = new Map<ExpenseCategory, { cents: number; count: number }>();
  const byMonth = new Map<string, { cents: number; count: number }>();
  let totalCents = 0;
  let count = 0;
  let points = 0;

  for (const entry of entries) {
    totalCents += entry.amount_cents;
    count += 1;
    points += pointsFor(entry);
    bump(byCategory, entry.category, entry.amount_cents);
    bump(byMonth, monthKey(entry.spent_at), entry.amount_cents);
  }

  return {
    from: range.from ?? null,
    to: range.to ?? null,
    totalSpent: fromCents(totalCents),
    count,
    points,
    byCategory: [...byCategory.entries()]
      .sort(([a, x], [b, y]) => y.cents - x.cents || a.localeCompare(b))
      .map(([category, t]) => ({ category, total: fromCents(t.cents), count: t.count })),
    byMonth: [...byMonth.entries()]
      .sort(([a], [b]) => b.localeCompare(a))
      .slice(0, MAX_MONTHS)
      .map(([month, t]) => ({ month, total: fromCents(t.cents), count: t.count })),
  };
}

export function createReportService(replay: RangeReplay): ReportService {
  return {
    async summary(userId, range = {}) {
      const entries: Expense[] = [];
      for await (const entry of replay(userId, range)) {
        entries.push(entry);
      }

      return summarize(entries, range);
    },
  };
}
