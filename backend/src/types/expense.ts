export const EXPENSE_CATEGORIES = [
  "food",
  "transport",
  "entertainment",
  "shopping",
  "bills",
  "healthcare",
  "education",
  "other",
] as const;

export type ExpenseCategory = (typeof EXPENSE_CATEGORIES)[number];

export interface Expense {
  id: string;
  user_id: string;
  // integer minor units; avoids float drift in sums
  amount_cents: number;
  category: ExpenseCategory;
  note: string | null;
  spent_at: Date;
  created_at: Date;
}

export interface NewExpense {
  id: string;
  user_id: string;
  amount_cents: number;
  category: ExpenseCategory;
  note: string | null;
  spent_at: Date;
}

export type ExpenseChanges = Partial<
  Pick<Expense, "amount_cents" | "category" | "note" | "spent_at">
>;

export type SortOrder = "asc" | "desc";

export interface ExpenseFilter {
  category?: ExpenseCategory;
  from?: Date;
  to?: Date;
  sort?: SortOrder;
  page?: number;
  // 0 = no pagination
  limit?: number;
}

export interface PaginatedResult<T> {
  data: T[];
  total: number;
  page: number;
  limit: number;
  totalPages: number;
}

export function isExpenseCategory(value: string): value is ExpenseCategory {
  return EXPENSE_CATEGORIES.some((category) => category === value);
}
