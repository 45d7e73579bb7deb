import { v4 as uuidv4 } from "uuid";

import type { AppConfig } from "../config";
import { isUniqueViolation } from "../db";
import {
  duplicateEmail,
  expiredToken,
  invalidCredentials,
  invalidSession,
  invalidToken,
  notVerified,
} from "../errors/app-error";
import type { UserRepository } from "../repositories/user.repository";
import type { User } from "../types/user";
import { signAccessToken, verifyAccessToken } from "../utils/jwt";
import { hashPassword, verifyPassword } from "../utils/password";
import {
  generateRefreshToken,
  generateVerificationToken,
  hashToken,
} from "../utils/refreshToken";
import type { Mailer } from "./mail.service";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export type AuthConfig = Pick<
  AppConfig,
  | "jwtSecret"
  | "accessTokenTtlSeconds"
  | "refreshTokenTtlDays"
  | "verificationTtlHours"
  | "bcryptRounds"
>;

export interface RegisterInput {
  email: string;
  password: string;
  firstName?: string | null;
  lastName?: string | null;
}

export interface LoginResult {
  user: User;
  accessToken: string;
  refreshToken: string;
  refreshTokenExpiresAt: Date;
}

export interface Session {
  user: User;
  roles: string[];
}

export interface AuthService {
  register(input: RegisterInput): Promise<User>;
  verify(token: string): Promise<User>;
  resendVerification(email: string): Promise<void>;
  login(email: string, password: string): Promise<LoginResult>;
  authorize(accessToken: string): Promise<Session>;
  refresh(refreshToken: string): Promise<string>;
  logout(refreshToken: string): Promise<void>;
}

export interface AuthServiceDeps {
  users: UserRepository;
  mailer: Mailer;
  config: AuthConfig;
  now?: () => Date;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function isActive(user: User): boolean {
  return user.deleted_at === null;
}

export function createAuthService({
  users,
  mailer,
  config,
  now = () => new Date(),
}: AuthServiceDeps): AuthService {
  async function issueVerification(user: Pick<User, "id" | "email">) {
    const token = generateVerificationToken();
    const expiresAt = new Date(now().getTime() + config.verificationTtlHours * HOUR_MS);

    await users.setVerificationToken(user.id, hashToken(token), expiresAt);
    await mailer.sendVerificationEmail({ to: user.email, token, expiresAt });
  }

  async function accessTokenFor(userId: string): Promise<string> {
    const roles = await users.getUserRoles(userId);
    return signAccessToken({ userId, roles }, config.jwtSecret, config.accessTokenTtlSeconds);
  }

  return {
    async register({ email, password, firstName, lastName }) {
      const normalized = normalizeEmail(email);

      const existingUser = await users.findByEmail(normalized);
      if (existingUser) {
        throw duplicateEmail();
      }

      const token = generateVerificationToken();
      const expiresAt = new Date(now().getTime() + config.verificationTtlHours * HOUR_MS);

      let user: User;
      try {
        user = await users.create(
          {
            id: uuidv4(),
            email: normalized,
            password_hash: await hashPassword(password, config.bcryptRounds),
            first_name: firstName ?? null,
            last_name: lastName ?? null,
            verification_token_hash: hashToken(token),
            verification_expires_at: expiresAt,
          },
          ["user"],
        );
      } catch (err) {
        // a concurrent registration won the insert
        if (isUniqueViolation(err, "users_email_key")) {
          throw duplicateEmail();
        }
        throw err;
      }

      console.log(`Created user: ${user.id}`);

      // The account is committed; a lost mail is recovered through resendVerification.
      try {
        await mailer.sendVerificationEmail({ to: user.email, token, expiresAt });
      } catch (err) {
        console.error(`Failed to send verification email for user ${user.id}:`, err);
      }

      return user;
    },

    async verify(token) {
      const user = await users.findByVerificationTokenHash(hashToken(token));

      if (!user || user.is_verified || !isActive(user)) {
        throw invalidToken();
      }

      if (
        !user.verification_expires_at ||
        user.verification_expires_at.getTime() < now().getTime()
      ) {
        throw expiredToken();
      }

      await users.markVerified(user.id);
      console.log(`Verified user: ${user.id}`);

      return {
        ...user,
        is_verified: true,
        verification_token_hash: null,
        verification_expires_at: null,
      };
    },

    async resendVerification(email) {
      const user = await users.findByEmail(normalizeEmail(email));

      if (!user || user.is_verified || !isActive(user)) {
        return;
      }

      await issueVerification(user);
    },

    async login(email, password) {
      const user = await users.findByEmail(normalizeEmail(email));

      if (!user || !isActive(user)) {
        throw invalidCredentials();
      }

      const isPasswordValid = await verifyPassword(password, user.password_hash);
      if (!isPasswordValid) {
        throw invalidCredentials();
      }

      if (!user.is_verified) {
        throw notVerified();
      }

      const accessToken = await accessTokenFor(user.id);

      const refreshToken = generateRefreshToken();
      const loggedInAt = now();
      const refreshTokenExpiresAt = new Date(
        loggedInAt.getTime() + config.refreshTokenTtlDays * DAY_MS,
      );

      await users.saveRefreshToken(user.id, hashToken(refreshToken), refreshTokenExpiresAt);
      await users.touchLastLogin(user.id, loggedInAt);

      return {
        user: { ...user, last_login_at: loggedInAt },
        accessToken,
        refreshToken,
        refreshTokenExpiresAt,
      };
    },

    async authorize(accessToken) {
      let userId: string;
      try {
        userId = verifyAccessToken(accessToken, config.jwtSecret).userId;
      } catch {
        throw invalidSession("Invalid Token");
      }

      const user = await users.findById(userId);
      if (!user || !isActive(user) || !user.is_verified) {
        throw invalidSession();
      }

      return { user, roles: await users.getUserRoles(user.id) };
    },

    async refresh(refreshToken) {
      const tokenHash = hashToken(refreshToken);
      const stored = await users.findRefreshToken(tokenHash, now());

      if (!stored) {
        throw invalidSession("Invalid refresh token");
      }

      const user = await users.findById(stored.user_id);

      if (!user || !isActive(user) || !user.is_verified) {
        await users.revokeRefreshToken(tokenHash);
        throw invalidSession();
      }

      return accessTokenFor(user.id);
    },

    async logout(refreshToken) {
      await users.revokeRefreshToken(hashToken(refreshToken));
    },
  };
}
