import { v4 as uuidv4 } from "uuid";

import {
  invalidAmount,
  invalidCategory,
  notFound,
  notOwner,
  validationFailed,
} from "../errors/app-error";
import { MAX_PAGE_SIZE, type ExpenseRepository } from "../repositories/expense.repository";
import {
  EXPENSE_CATEGORIES,
  isExpenseCategory,
  type Expense,
  type ExpenseCategory,
  type ExpenseChanges,
  type ExpenseFilter,
  type PaginatedResult,
} from "../types/expense";
import { MAX_AMOUNT, hasAtMostTwoDecimals, toCents } from "../utils/money";

export const MAX_NOTE_LENGTH = 500;
const REPLAY_PAGE_SIZE = MAX_PAGE_SIZE;

export interface EntryInput {
  amount: number;
  category: string;
  note?: string | null;
  spentAt?: Date;
}

export type EntryChanges = Partial<EntryInput>;

export interface LedgerService {
  addEntry(userId: string, input: EntryInput): Promise<Expense>;
  getEntry(userId: string, entryId: string): Promise<Expense>;
  updateEntry(userId: string, entryId: string, changes: EntryChanges): Promise<Expense>;
  listEntries(userId: string, filter?: ExpenseFilter): Promise<PaginatedResult<Expense>>;
  entries(userId: string, filter?: Omit<ExpenseFilter, "page" | "limit" | "sort">): AsyncGenerator<Expense>;
  deleteEntry(userId: string, entryId: string): Promise<void>;
}

export interface LedgerServiceDeps {
  expenses: ExpenseRepository;
  /** Called after every committed mutation of a user's ledger. */
  onChange?: (userId: string) => void;
  now?: () => Date;
}

export function amountToCents(amount: number): number {
  if (typeof amount !== "number" || !Number.isFinite(amount)) {
    throw invalidAmount("Amount must be a valid number");
  }
  if (amount <= 0) {
    throw invalidAmount("Amount must be greater than 0");
  }
  if (amount > MAX_AMOUNT) {
    throw invalidAmount("Amount exceeds maximum allowed value");
  }
  if (!hasAtMostTwoDecimals(amount)) {
    throw invalidAmount("Amount can have at most 2 decimal places");
  }

  const cents = toCents(amount);
  if (cents <= 0) {
    throw invalidAmount("Amount must be greater than 0");
  }

  return cents;
}

export function normalizeCategory(category: string): ExpenseCategory {
  const normalized = category.trim().toLowerCase();

  if (!isExpenseCategory(normalized)) {
    throw invalidCategory(EXPENSE_CATEGORIES);
  }

  return normalized;
}

export function normalizeNote(note: string | null | undefined): string | null {
  const trimmed = note?.trim() ?? "";

  if (trimmed.length > MAX_NOTE_LENGTH) {
    throw validationFailed([`Note must be ${MAX_NOTE_LENGTH} characters or less`]);
  }

  return trimmed.length > 0 ? trimmed : null;
}

function normalizeFilter(filter: ExpenseFilter): ExpenseFilter {
  const page = Math.max(1, Math.floor(filter.page ?? 1));
  const limit = Math.min(MAX_PAGE_SIZE, Math.max(0, Math.floor(filter.limit ?? 0)));

  return { ...filter, page, limit, sort: filter.sort === "asc" ? "asc" : "desc" };
}

export function createLedgerService({
  expenses,
  onChange = () => undefined,
  now = () => new Date(),
}: LedgerServiceDeps): LedgerService {
  async function ownedEntry(userId: string, entryId: string): Promise<Expense> {
    const entry = await expenses.findById(entryId);

    if (!entry) {
      throw notFound("Expense");
    }
    if (entry.user_id !== userId) {
      throw notOwner();
    }

    return entry;
  }

  const service: LedgerService = {
    async addEntry(userId, input) {
      const entry = await expenses.create({
        id: uuidv4(),
        user_id: userId,
        amount_cents: amountToCents(input.amount),
        category: normalizeCategory(input.category),
        note: normalizeNote(input.note),
        spent_at: input.spentAt ?? now(),
      });

      onChange(userId);
      console.log(`Created expense: ${entry.id}`);

      return entry;
    },

    async getEntry(userId, entryId) {
      return ownedEntry(userId, entryId);
    },

    async updateEntry(userId, entryId, changes) {
      await ownedEntry(userId, entryId);

      const updates: ExpenseChanges = {};
      if (changes.amount !== undefined) updates.amount_cents = amountToCents(changes.amount);
      if (changes.category !== undefined) updates.category = normalizeCategory(changes.category);
      if (changes.note !== undefined) updates.note = normalizeNote(changes.note);
      if (changes.spentAt !== undefined) updates.spent_at = changes.spentAt;

      const updated = await expenses.update(entryId, userId, updates);
      if (!updated) {
        // removed between the ownership check and the write
        throw notFound("Expense");
      }

      onChange(userId);
      console.log(`Updated expense: ${entryId}`);

      return updated;
    },

    async listEntries(userId, filter = {}) {
      return expenses.list(userId, normalizeFilter(filter));
    },

    async *entries(userId, filter = {}) {
      for (let page = 1; ; page++) {
        const result = await expenses.list(
          userId,
          normalizeFilter({ ...filter, sort: "asc", page, limit: REPLAY_PAGE_SIZE }),
        );

        yield* result.data;

        if (page >= result.totalPages) {
          return;
        }
      }
    },

    async deleteEntry(userId, entryId) {
      await ownedEntry(userId, entryId);

      const deleted = await expenses.delete(entryId, userId);
      if (!deleted) {
        throw notFound("Expense");
      }

      onChange(userId);
      console.log(`Deleted expense: ${entryId}`);
    },
  };

  return service;
}
