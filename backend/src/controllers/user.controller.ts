import type { Request, Response } from "express";
import { validate as isUuid } from "uuid";

import { notFound } from "../errors/app-error";
import type { AuthRequest } from "../middlewares/auth.middleware";
import { sessionOf } from "../middlewares/auth.middleware";
import type { UserService } from "../services/user.service";
import { listUsersSchema, updateProfileSchema } from "../validation/user.schema";
import { validate } from "../validation/validate";
import { toProfileResponse, toUserResponse } from "./presenters";

function targetId(req: Request): string {
  const { id } = req.params;

  if (!id || !isUuid(id)) {
    throw notFound("User");
  }

  return id;
}

export function createUserController(users: UserService) {
  return {
    async profile(req: AuthRequest, res: Response) {
      const { user } = sessionOf(req);
      res.json(toProfileResponse(await users.getProfile(user.id)));
    },

    async updateProfile(req: AuthRequest, res: Response) {
      const { user } = sessionOf(req);
      const changes = await validate(updateProfileSchema, req.body);

      res.json(toProfileResponse(await users.updateProfile(user.id, changes)));
    },

    async list(req: AuthRequest, res: Response) {
      const query = await validate(listUsersSchema, req.query);
      const result = await users.listUsers(query);

      res.json({
        items: result.items.map((u) => toUserResponse(u)),
        total: result.total,
        page: result.page,
        pages: result.pages,
      });
    },

    async get(req: AuthRequest, res: Response) {
      const user = await users.getUser(sessionOf(req), targetId(req));
      res.json(toUserResponse(user));
    },

    async remove(req: AuthRequest, res: Response) {
      await users.deleteUser(targetId(req));
      res.status(204).send();
    },
  };
}

export type UserController = ReturnType<typeof createUserController>;
