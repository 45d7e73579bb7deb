import type { Pool } from "pg";

import { withTransaction } from "../db";
import type { RefreshToken } from "../types/refresh-token";
import type { NewUser, RoleName, User, UserNames } from "../types/user";

export interface UserListQuery {
  search?: string;
  limit: number;
  offset: number;
}

export interface UserRepository {
  /** Includes soft-deleted users; emails stay reserved. */
  findByEmail(email: string): Promise<User | null>;
  findById(userId: string): Promise<User | null>;
  findByVerificationTokenHash(tokenHash: string): Promise<User | null>;
  /** Inserts the user and links its roles in one transaction. */
  create(user: NewUser, roles: RoleName[]): Promise<User>;
  setVerificationToken(userId: string, tokenHash: string, expiresAt: Date): Promise<void>;
  markVerified(userId: string): Promise<void>;
  touchLastLogin(userId: string, at: Date): Promise<void>;
  updateNames(userId: string, names: UserNames): Promise<User | null>;
  softDelete(userId: string, at: Date): Promise<boolean>;
  list(query: UserListQuery): Promise<{ rows: User[]; total: number }>;
  getUserRoles(userId: string): Promise<string[]>;
  saveRefreshToken(userId: string, tokenHash: string, expiresAt: Date): Promise<void>;
  findRefreshToken(tokenHash: string, now: Date): Promise<RefreshToken | null>;
  revokeRefreshToken(tokenHash: string): Promise<void>;
}

/** Substring pattern for ILIKE with the wildcards in `search` taken literally. */
export function likePattern(search: string): string {
  return `%${search.replace(/[\\%_]/g, "\\$&")}%`;
}

export function createUserRepository(pool: Pool): UserRepository {
  return {
    async findByEmail(email) {
      const result = await pool.query<User>(
        `SELECT * FROM users WHERE email = $1`,
        [email],
      );

      return result.rows[0] ?? null;
    },

    async findById(userId) {
      const result = await pool.query<User>(`SELECT * FROM users WHERE id = $1`, [
        userId,
      ]);

      return result.rows[0] ?? null;
    },

    async findByVerificationTokenHash(tokenHash) {
      const result = await pool.query<User>(
        `SELECT * FROM users WHERE verification_token_hash = $1`,
        [tokenHash],
      );

      return result.rows[0] ?? null;
    },

    async create(user, roles) {
      return withTransaction(pool, async (client) => {
        const result = await client.query<User>(
          `
            INSERT INTO users (
              id, email, password_hash, first_name, last_name,
              verification_token_hash, verification_expires_at
            )
            VALUES ($1, $2, $3, $4, $5, $6, $7)
            RETURNING *;
          `,
          [
            user.id,
            user.email,
            user.password_hash,
            user.first_name,
            user.last_name,
            user.verification_token_hash,
            user.verification_expires_at,
          ],
        );

        await client.query(
          `
            INSERT INTO user_roles (user_id, role_id)
            SELECT $1, id FROM roles WHERE name = ANY($2::text[])
            ON CONFLICT DO NOTHING
          `,
          [user.id, roles],
        );

        return result.rows[0];
      });
    },

    async setVerificationToken(userId, tokenHash, expiresAt) {
      await pool.query(
        `
          UPDATE users
          SET verification_token_hash = $2, verification_expires_at = $3
          WHERE id = $1
        `,
        [userId, tokenHash, expiresAt],
      );
    },

    async markVerified(userId) {
      await pool.query(
        `
          UPDATE users
          SET is_verified = true,
              verification_token_hash = NULL,
              verification_expires_at = NULL
          WHERE id = $1
        `,
        [userId],
      );
    },

    async touchLastLogin(userId, at) {
      await pool.query(`UPDATE users SET last_login_at = $2 WHERE id = $1`, [
        userId,
        at,
      ]);
    },

    async updateNames(userId, names) {
      const result = await pool.query<User>(
        `
          UPDATE users
          SET first_name = CASE WHEN $2 THEN $3 ELSE first_name END,
              last_name = CASE WHEN $4 THEN $5 ELSE last_name END
          WHERE id = $1
          RETURNING *;
        `,
        [
          userId,
          names.first_name !== undefined,
          names.first_name ?? null,
          names.last_name !== undefined,
          names.last_name ?? null,
        ],
      );

      return result.rows[0] ?? null;
    },

    async softDelete(userId, at) {
      const result = await pool.query(
        `UPDATE users SET deleted_at = $2 WHERE id = $1 AND deleted_at IS NULL`,
        [userId, at],
      );

      return result.rowCount === 1;
    },

    async list({ search, limit, offset }) {
      const pattern = search ? likePattern(search) : null;
      const where = `
        WHERE deleted_at IS NULL
          AND (
            $1::text IS NULL
            OR email ILIKE $1 ESCAPE '\\'
            OR first_name ILIKE $1 ESCAPE '\\'
            OR last_name ILIKE $1 ESCAPE '\\'
          )
      `;

      const [rows, count] = await Promise.all([
        pool.query<User>(
          `SELECT * FROM users ${where} ORDER BY created_at DESC, id LIMIT $2 OFFSET $3`,
          [pattern, limit, offset],
        ),
        pool.query<{ total: string }>(
          `SELECT COUNT(*) AS total FROM users ${where}`,
          [pattern],
        ),
      ]);

      return { rows: rows.rows, total: Number(count.rows[0]?.total ?? 0) };
    },

    async getUserRoles(userId) {
      const result = await pool.query<{ name: string }>(
        `
          SELECT r.name
          FROM roles r
          JOIN user_roles ur ON ur.role_id = r.id
          WHERE ur.user_id = $1
          ORDER BY r.name
        `,
        [userId],
      );

      return result.rows.map((r) => r.name);
    },

    async saveRefreshToken(userId, tokenHash, expiresAt) {
      await pool.query(
        `
          INSERT INTO refresh_tokens (user_id, token_hash, expires_at)
          VALUES ($1, $2, $3)
        `,
        [userId, tokenHash, expiresAt],
      );
    },

    async findRefreshToken(tokenHash, now) {
      const result = await pool.query<RefreshToken>(
        `
          SELECT *
          FROM refresh_tokens
          WHERE token_hash = $1
            AND revoked = false
            AND expires_at > $2
          LIMIT 1
        `,
        [tokenHash, now],
      );

      return result.rows[0] ?? null;
    },

    async revokeRefreshToken(tokenHash) {
      await pool.query(
        `UPDATE refresh_tokens SET revoked = true WHERE token_hash = $1`,
        [tokenHash],
      );
    },
  };
}
