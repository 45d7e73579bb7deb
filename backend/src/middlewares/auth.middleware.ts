import type { Request, Response, NextFunction } from "express";

import { invalidSession } from "../errors/app-error";
import type { AuthService } from "../services/auth.service";
import type { User } from "../types/user";

export interface AuthRequest extends Request {
  userId?: string;
  roles?: string[];
  user?: User;
}

export function requireAuth(auth: AuthService) {
  return async (req: AuthRequest, _res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      throw invalidSession();
    }

    const token = authHeader.slice("Bearer ".length).trim();
    const session = await auth.authorize(token);

    req.userId = session.user.id;
    req.roles = session.roles;
    req.user = session.user;

    next();
  };
}

// Handlers behind requireAuth use this to read the session.
export function sessionOf(req: AuthRequest) {
  if (!req.userId || !req.user) {
    throw invalidSession();
  }

  return { user: req.user, roles: req.roles ?? [] };
}
