import dotenv from "dotenv";

export interface AppConfig {
  port: number;
  databaseUrl: string | undefined;
  jwtSecret: string;
  accessTokenTtlSeconds: number;
  refreshTokenTtlDays: number;
  verificationTtlHours: number;
  bcryptRounds: number;
  allowedOrigins: string[];
  mailFrom: string;
  isProduction: boolean;
  logRequests: boolean;
}

const DEFAULT_ORIGINS = "http://localhost:3000,http://localhost:5173";

function readInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
): number {
  const raw = env[name];

  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }

  const value = Number(raw);

  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }

  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const jwtSecret = env.JWT_SECRET;

  if (!jwtSecret) {
    throw new Error("Missing JWT_SECRET in .env");
  }

  return {
    port: readInt(env, "PORT", 5000),
    databaseUrl: env.DATABASE_URL,
    jwtSecret,
    accessTokenTtlSeconds: readInt(env, "ACCESS_TOKEN_TTL_SECONDS", 15 * 60),
    refreshTokenTtlDays: readInt(env, "REFRESH_TOKEN_TTL_DAYS", 7),
    verificationTtlHours: readInt(env, "VERIFICATION_TTL_HOURS", 24),
    bcryptRounds: readInt(env, "BCRYPT_ROUNDS", 10),
    allowedOrigins: (env.ALLOWED_ORIGINS ?? DEFAULT_ORIGINS)
      .split(",")
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    mailFrom: env.MAIL_FROM ?? "noreply@expense-ledger.local",
    isProduction: env.NODE_ENV === "production",
    logRequests: env.LOG_REQUESTS !== "false",
  };
}

export function loadEnvFile(): void {
  dotenv.config();
}
