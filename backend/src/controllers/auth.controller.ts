import type { Request, Response, CookieOptions } from "express";

import type { AppConfig } from "../config";
import { invalidSession } from "../errors/app-error";
import type { AuthRequest } from "../middlewares/auth.middleware";
import { sessionOf } from "../middlewares/auth.middleware";
import type { AuthService } from "../services/auth.service";
import {
  loginSchema,
  registerSchema,
  resendVerificationSchema,
  verifySchema,
} from "../validation/auth.schema";
import { validate } from "../validation/validate";
import { toUserResponse } from "./presenters";

export const REFRESH_COOKIE = "refreshToken";

function readRefreshCookie(req: Request): string | null {
  const token: unknown = req.cookies?.[REFRESH_COOKIE];
  return typeof token === "string" && token.length > 0 ? token : null;
}

export function createAuthController(
  auth: AuthService,
  config: Pick<AppConfig, "isProduction">,
) {
  const cookieBase: CookieOptions = {
    httpOnly: true,
    secure: config.isProduction,
    sameSite: config.isProduction ? "none" : "lax",
    path: "/auth",
  };

  return {
    async register(req: Request, res: Response) {
      const input = await validate(registerSchema, req.body);

      const user = await auth.register({
        email: input.email,
        password: input.password,
        firstName: input.first_name,
        lastName: input.last_name,
      });

      res.status(201).json(toUserResponse(user));
    },

    async verify(req: Request, res: Response) {
      const { token } = await validate(verifySchema, req.body);
      const user = await auth.verify(token);

      res.json({ message: "Email verified", user: toUserResponse(user) });
    },

    async resendVerification(req: Request, res: Response) {
      const { email } = await validate(resendVerificationSchema, req.body);
      await auth.resendVerification(email);

      res.status(202).json({
        message: "If the account exists and is unverified, a new token has been sent",
      });
    },

    async login(req: Request, res: Response) {
      const { email, password } = await validate(loginSchema, req.body);
      const result = await auth.login(email, password);

      // Send refresh token as HttpOnly cookie
      res.cookie(REFRESH_COOKIE, result.refreshToken, {
        ...cookieBase,
        expires: result.refreshTokenExpiresAt,
      });

      res.json({ accessToken: result.accessToken });
    },

    async refresh(req: Request, res: Response) {
      const token = readRefreshCookie(req);

      if (!token) {
        throw invalidSession();
      }

      const accessToken = await auth.refresh(token);

      res.json({ accessToken });
    },

    async logout(req: Request, res: Response) {
      const token = readRefreshCookie(req);

      if (token) {
        await auth.logout(token);
      }

      res.clearCookie(REFRESH_COOKIE, cookieBase);
      res.json({ message: "Logged out" });
    },

    async me(req: AuthRequest, res: Response) {
      const { user, roles } = sessionOf(req);
      res.json(toUserResponse(user, roles));
    },
  };
}

export type AuthController = ReturnType<typeof createAuthController>;
