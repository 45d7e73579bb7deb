import type { Response, NextFunction } from "express";

import { forbidden, invalidSession } from "../errors/app-error";
import type { RoleName } from "../types/user";
import type { AuthRequest } from "./auth.middleware";

export function requireRole(...allowedRoles: RoleName[]) {
  return (req: AuthRequest, _res: Response, next: NextFunction) => {
    if (!req.userId || !req.roles) {
      throw invalidSession();
    }

    const hasAccess = req.roles.some((role) =>
      allowedRoles.some((allowed) => allowed === role),
    );

    if (!hasAccess) {
      throw forbidden();
    }

    next();
  };
}
