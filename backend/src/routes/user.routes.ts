import { Router, type RequestHandler } from "express";

import type { UserController } from "../controllers/user.controller";
import { requireRole } from "../middlewares/role.middleware";

export function profileRouter(controller: UserController, requireAuth: RequestHandler) {
  const router = Router();

  router.get("/", requireAuth, controller.profile);
  router.patch("/", requireAuth, controller.updateProfile);

  return router;
}

export function userRouter(controller: UserController, requireAuth: RequestHandler) {
  const router = Router();

  router.use(requireAuth);
  router.get("/", requireRole("admin"), controller.list);
  router.get("/:id", controller.get);
  router.delete("/:id", requireRole("admin"), controller.remove);

  return router;
}
