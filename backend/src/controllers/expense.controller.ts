import type { Request, Response } from "express";
import { validate as isUuid } from "uuid";

import { notFound } from "../errors/app-error";
import type { AuthRequest } from "../middlewares/auth.middleware";
import { sessionOf } from "../middlewares/auth.middleware";
import { normalizeCategory, type LedgerService } from "../services/ledger.service";
import type { PointsService } from "../services/points.service";
import type { ReportService } from "../services/report.service";
import { EXPENSE_CATEGORIES } from "../types/expense";
import {
  createExpenseSchema,
  listExpensesSchema,
  reportQuerySchema,
  updateExpenseSchema,
} from "../validation/expense.schema";
import { validate } from "../validation/validate";
import { toExpenseResponse } from "./presenters";

function entryId(req: Request): string {
  const { id } = req.params;

  // ids are uuid columns; anything else cannot exist
  if (!id || !isUuid(id)) {
    throw notFound("Expense");
  }

  return id;
}

export function createExpenseController(
  ledger: LedgerService,
  points: PointsService,
  reports: ReportService,
) {
  return {
    categories(_req: Request, res: Response) {
      res.json(EXPENSE_CATEGORIES);
    },

    async list(req: AuthRequest, res: Response) {
      const { user } = sessionOf(req);
      const query = await validate(listExpensesSchema, req.query);

      const result = await ledger.listEntries(user.id, {
        category: query.category ? normalizeCategory(query.category) : undefined,
        from: query.from,
        to: query.to,
        sort: query.sort,
        page: query.page,
        limit: query.limit,
      });

      res.json({ ...result, data: result.data.map(toExpenseResponse) });
    },

    async create(req: AuthRequest, res: Response) {
      const { user } = sessionOf(req);
      const input = await validate(createExpenseSchema, req.body);

      const entry = await ledger.addEntry(user.id, {
        amount: input.amount,
        category: input.category,
        note: input.note,
        spentAt: input.spent_at,
      });

      res.status(201).json(toExpenseResponse(entry));
    },

    async get(req: AuthRequest, res: Response) {
      const { user } = sessionOf(req);
      const entry = await ledger.getEntry(user.id, entryId(req));

      res.json(toExpenseResponse(entry));
    },

    async update(req: AuthRequest, res: Response) {
      const { user } = sessionOf(req);
      const input = await validate(updateExpenseSchema, req.body);

      const entry = await ledger.updateEntry(user.id, entryId(req), {
        amount: input.amount,
        category: input.category,
        note: input.note,
        spentAt: input.spent_at,
      });

      res.json(toExpenseResponse(entry));
    },

    async remove(req: AuthRequest, res: Response) {
      const { user } = sessionOf(req);
      await ledger.deleteEntry(user.id, entryId(req));

      res.status(204).send();
    },

    async balance(req: AuthRequest, res: Response) {
      const { user } = sessionOf(req);
      res.json({ balance: await points.balance(user.id) });
    },

    async summary(req: AuthRequest, res: Response) {
      const { user } = sessionOf(req);
      const range = await validate(reportQuerySchema, req.query);
      const summary = await reports.summary(user.id, range);

      res.json({
        from: summary.from,
        to: summary.to,
        total_spent: summary.totalSpent,
        count: summary.count,
        points: summary.points,
        by_category: summary.byCategory,
        by_month: summary.byMonth,
      });
    },
  };
}

export type ExpenseController = ReturnType<typeof createExpenseController>;
