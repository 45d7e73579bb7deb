import { v4 as uuidv4 } from "uuid";

import { loadConfig, type AppConfig } from "../config";
import type { UserRepository } from "../repositories/user.repository";
import type { Mailer, VerificationMessage } from "../services/mail.service";
import type { Expense } from "../types/expense";
import type { User } from "../types/user";

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...loadConfig({
      JWT_SECRET: "test-secret",
      BCRYPT_ROUNDS: "4",
      LOG_REQUESTS: "false",
    }),
    ...overrides,
  };
}

export function createCapturingMailer() {
  const sent: VerificationMessage[] = [];

  const mailer: Mailer = {
    async sendVerificationEmail(message) {
      sent.push(message);
    },
  };

  function lastTokenFor(email: string): string {
    const message = [...sent].reverse().find((m) => m.to === email);
    if (!message) {
      throw new Error(`No verification mail sent to ${email}`);
    }
    return message.token;
  }

  return { sent, mailer, lastTokenFor };
}

export async function seedUser(
  users: UserRepository,
  overrides: Partial<Pick<User, "email" | "first_name" | "last_name">> = {},
  roles: Array<"user" | "admin"> = ["user"],
): Promise<User> {
  const user = await users.create(
    {
      id: uuidv4(),
      email: overrides.email ?? `${uuidv4()}@example.com`,
      password_hash: "not-a-real-hash",
      first_name: overrides.first_name ?? null,
      last_name: overrides.last_name ?? null,
      verification_token_hash: uuidv4(),
      verification_expires_at: new Date(Date.now() + 60_000),
    },
    roles,
  );

  await users.markVerified(user.id);

  return { ...user, is_verified: true, verification_token_hash: null, verification_expires_at: null };
}

export function makeExpense(overrides: Partial<Expense> = {}): Expense {
  return {
    id: uuidv4(),
    user_id: "user-1",
    amount_cents: 1000,
    category: "food",
    note: null,
    spent_at: new Date("2024-01-15T12:00:00Z"),
    created_at: new Date("2024-01-15T12:00:00Z"),
    ...overrides,
  };
}
