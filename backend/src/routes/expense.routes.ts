import { Router, type RequestHandler } from "express";

import type { ExpenseController } from "../controllers/expense.controller";

export function expenseRouter(controller: ExpenseController, requireAuth: RequestHandler) {
  const router = Router();

  router.get("/categories", controller.categories);

  router.use(requireAuth);
  router.get("/", controller.list);
  router.post("/", controller.create);
  router.get("/:id", controller.get);
  router.put("/:id", controller.update);
  router.delete("/:id", controller.remove);

  return router;
}

export function pointsRouter(controller: ExpenseController, requireAuth: RequestHandler) {
  const router = Router();

  router.get("/", requireAuth, controller.balance);

  return router;
}

export function reportRouter(controller: ExpenseController, requireAuth: RequestHandler) {
  const router = Router();

  router.get("/summary", requireAuth, controller.summary);

  return router;
}
