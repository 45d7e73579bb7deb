import express from "express";
import cors from "cors";
import cookieParser from "cookie-parser";

import type { AppConfig } from "./config";
import { createAuthController } from "./controllers/auth.controller";
import { createExpenseController } from "./controllers/expense.controller";
import { createUserController } from "./controllers/user.controller";
import { requireAuth } from "./middlewares/auth.middleware";
import { errorHandler, notFoundHandler } from "./middlewares/error.middleware";
import { requestLogger } from "./middlewares/request-logger.middleware";
import type { ExpenseRepository } from "./repositories/expense.repository";
import type { ProfileRepository } from "./repositories/profile.repository";
import type { UserRepository } from "./repositories/user.repository";
import { authRouter } from "./routes/auth.routes";
import { expenseRouter, pointsRouter, reportRouter } from "./routes/expense.routes";
import { profileRouter, userRouter } from "./routes/user.routes";
import { createAuthService } from "./services/auth.service";
import { createLedgerService } from "./services/ledger.service";
import type { Mailer } from "./services/mail.service";
import { createPointsService } from "./services/points.service";
import { createReportService } from "./services/report.service";
import { createUserService } from "./services/user.service";

export interface AppDependencies {
  config: AppConfig;
  users: UserRepository;
  profiles: ProfileRepository;
  expenses: ExpenseRepository;
  mailer: Mailer;
  checkDatabase: () => Promise<boolean>;
  now?: () => Date;
}

export function createServices({ config, users, profiles, expenses, mailer, now }: AppDependencies) {
  const auth = createAuthService({ users, mailer, config, now });

  // points and ledger reference each other: replay reads the ledger,
  // ledger mutations invalidate cached balances
  const points = createPointsService((userId) => ledger.entries(userId));
  const ledger = createLedgerService({ expenses, onChange: points.invalidate, now });

  const reports = createReportService((userId, range) => ledger.entries(userId, range));
  const userService = createUserService({
    users,
    profiles,
    points,
    replay: (userId) => ledger.entries(userId),
    now,
  });

  return { auth, ledger, points, reports, users: userService };
}

export function createApp(deps: AppDependencies) {
  const { config } = deps;
  const services = createServices(deps);

  const app = express();

  // Middlewares
  app.use(
    cors({
      origin: config.allowedOrigins,
      credentials: true,
    }),
  );
  app.use(express.json());
  app.use(cookieParser());

  if (config.logRequests) {
    app.use(requestLogger);
  }

  const authenticate = requireAuth(services.auth);
  const expenseController = createExpenseController(
    services.ledger,
    services.points,
    services.reports,
  );
  const userController = createUserController(services.users);

  app.get("/health", async (_req, res) => {
    const database = await deps.checkDatabase();
    res.status(database ? 200 : 503).json({
      status: database ? "ok" : "degraded",
      database: database ? "up" : "down",
    });
  });

  app.use("/auth", authRouter(createAuthController(services.auth, config), authenticate));
  app.use("/expenses", expenseRouter(expenseController, authenticate));
  app.use("/points", pointsRouter(expenseController, authenticate));
  app.use("/reports", reportRouter(expenseController, authenticate));
  app.use("/profile", profileRouter(userController, authenticate));
  app.use("/users", userRouter(userController, authenticate));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
