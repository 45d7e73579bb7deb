import { createApp } from "./app";
import { loadConfig, loadEnvFile } from "./config";
import { createPool, pingDatabase } from "./db";
import { createExpenseRepository } from "./repositories/expense.repository";
import { createProfileRepository } from "./repositories/profile.repository";
import { createUserRepository } from "./repositories/user.repository";
import { createConsoleMailer } from "./services/mail.service";

async function start() {
  loadEnvFile();
  const config = loadConfig();

  if (!config.databaseUrl) {
    throw new Error("Missing DATABASE_URL in .env");
  }

  const pool = createPool(config.databaseUrl);

  if (!(await pingDatabase(pool))) {
    throw new Error("Database is not reachable");
  }

  const app = createApp({
    config,
    users: createUserRepository(pool),
    profiles: createProfileRepository(pool),
    expenses: createExpenseRepository(pool),
    mailer: createConsoleMailer(config.mailFrom),
    checkDatabase: () => pingDatabase(pool),
  });

  const server = app.listen(config.port, () => {
    console.log(`Server running on port ${config.port}`);
  });

  const shutdown = () => {
    console.log("\nShutting down gracefully...");
    server.close(() => {
      pool
        .end()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error("Failed to close database pool:", err);
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

start().catch((err: unknown) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
