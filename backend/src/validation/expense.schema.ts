import * as yup from "yup";

import { MAX_PAGE_SIZE } from "../repositories/expense.repository";

// Positivity and precision are left to the ledger (INVALID_AMOUNT).
const amount = yup.number().typeError("Amount must be a valid number");

export const createExpenseSchema = yup.object({
  amount: amount.required("Amount is required"),
  category: yup.string().required("Category is required"),
  note: yup.string().nullable().optional(),
  spent_at: yup.date().typeError("spent_at must be a valid date").optional(),
});

export const updateExpenseSchema = yup.object({
  amount: amount.optional(),
  category: yup.string().optional(),
  note: yup.string().nullable().optional(),
  spent_at: yup.date().typeError("spent_at must be a valid date").optional(),
});

const range = {
  from: yup.date().typeError("from must be a valid date").optional(),
  to: yup.date().typeError("to must be a valid date").optional(),
};

export const listExpensesSchema = yup.object({
  ...range,
  category: yup.string().optional(),
  sort: yup.string().oneOf(["asc", "desc"] as const).optional(),
  page: yup.number().integer().min(1).optional(),
  limit: yup.number().integer().min(0).max(MAX_PAGE_SIZE).optional(),
});

export const reportQuerySchema = yup.object(range);
