import type { Pool } from "pg";

import { lockUser, withTransaction } from "../db";
import type {
  Expense,
  ExpenseChanges,
  ExpenseFilter,
  NewExpense,
  PaginatedResult,
} from "../types/expense";

export interface ExpenseRepository {
  create(expense: NewExpense): Promise<Expense>;
  findById(id: string): Promise<Expense | null>;
  update(id: string, userId: string, changes: ExpenseChanges): Promise<Expense | null>;
  delete(id: string, userId: string): Promise<boolean>;
  /**
   * Ordered by spent_at, created_at, id in the filter's direction, so a
   * page is stable across calls.
   */
  list(userId: string, filter: ExpenseFilter): Promise<PaginatedResult<Expense>>;
}

export const MAX_PAGE_SIZE = 100;

export function buildPage<T>(
  data: T[],
  total: number,
  page: number,
  limit: number,
): PaginatedResult<T> {
  return {
    data,
    total,
    page: limit > 0 ? page : 1,
    limit: limit > 0 ? limit : total,
    totalPages: limit > 0 ? Math.ceil(total / limit) : 1,
  };
}

export function createExpenseRepository(pool: Pool): ExpenseRepository {
  return {
    async create(expense) {
      return withTransaction(pool, async (client) => {
        await lockUser(client, expense.user_id);

        const result = await client.query<Expense>(
          `
            INSERT INTO expenses (id, user_id, amount_cents, category, note, spent_at)
            VALUES ($1, $2, $3, $4, $5, $6)
            RETURNING *;
          `,
          [
            expense.id,
            expense.user_id,
            expense.amount_cents,
            expense.category,
            expense.note,
            expense.spent_at,
          ],
        );

        return result.rows[0];
      });
    },

    async findById(id) {
      const result = await pool.query<Expense>(
        `SELECT * FROM expenses WHERE id = $1`,
        [id],
      );

      return result.rows[0] ?? null;
    },

    async update(id, userId, changes) {
      return withTransaction(pool, async (client) => {
        await lockUser(client, userId);

        const result = await client.query<Expense>(
          `
            UPDATE expenses
            SET amount_cents = COALESCE($3, amount_cents),
                category = COALESCE($4, category),
                note = CASE WHEN $5 THEN $6 ELSE note END,
                spent_at = COALESCE($7, spent_at)
            WHERE id = $1 AND user_id = $2
            RETURNING *;
          `,
          [
            id,
            userId,
            changes.amount_cents ?? null,
            changes.category ?? null,
            changes.note !== undefined,
            changes.note ?? null,
            changes.spent_at ?? null,
          ],
        );

        return result.rows[0] ?? null;
      });
    },

    async delete(id, userId) {
      return withTransaction(pool, async (client) => {
        await lockUser(client, userId);

        const result = await client.query(
          `DELETE FROM expenses WHERE id = $1 AND user_id = $2`,
          [id, userId],
        );

        return result.rowCount === 1;
      });
    },

    async list(userId, filter) {
      const direction = filter.sort === "asc" ? "ASC" : "DESC";
      const page = filter.page ?? 1;
      const limit = filter.limit ?? 0;

      const where = `
        WHERE user_id = $1
          AND ($2::text IS NULL OR category = $2)
          AND ($3::timestamptz IS NULL OR spent_at >= $3)
          AND ($4::timestamptz IS NULL OR spent_at <= $4)
      `;
      const params = [
        userId,
        filter.category ?? null,
        filter.from ?? null,
        filter.to ?? null,
      ];

      const paging = limit > 0 ? `LIMIT ${limit} OFFSET ${(page - 1) * limit}` : "";

      const [rows, count] = await Promise.all([
        pool.query<Expense>(
          `
            SELECT * FROM expenses ${where}
            ORDER BY spent_at ${direction}, created_at ${direction}, id ${direction}
            ${paging}
          `,
          params,
        ),
        pool.query<{ total: string }>(
          `SELECT COUNT(*) AS total FROM expenses ${where}`,
          params,
        ),
      ]);

      return buildPage(rows.rows, Number(count.rows[0]?.total ?? 0), page, limit);
    },
  };
}
