import { Router, type RequestHandler } from "express";

import type { AuthController } from "../controllers/auth.controller";

export function authRouter(controller: AuthController, requireAuth: RequestHandler) {
  const router = Router();

  router.post("/register", controller.register);
  router.post("/verify", controller.verify);
  router.post("/resend-verification", controller.resendVerification);
  router.post("/login", controller.login);
  router.post("/refresh", controller.refresh);
  router.post("/logout", controller.logout);
  router.get("/me", requireAuth, controller.me);

  return router;
}
