import type { Pool } from "pg";

import type { ProfileChanges, UserProfile } from "../types/profile";

export interface ProfileRepository {
  findByUserId(userId: string): Promise<UserProfile | null>;
  /** Creates the row on first write. */
  upsert(userId: string, changes: ProfileChanges): Promise<UserProfile>;
}

const PROFILE_FIELDS = ["bio", "gender", "age", "profile_picture"] as const;

export function createProfileRepository(pool: Pool): ProfileRepository {
  return {
    async findByUserId(userId) {
      const result = await pool.query<UserProfile>(
        `SELECT * FROM user_profiles WHERE user_id = $1`,
        [userId],
      );

      return result.rows[0] ?? null;
    },

    async upsert(userId, changes) {
      const fields = PROFILE_FIELDS.filter((field) => changes[field] !== undefined);
      const values = fields.map((field) => changes[field] ?? null);

      const columns = ["user_id", ...fields].join(", ");
      const placeholders = ["$1", ...fields.map((_, i) => `$${i + 2}`)].join(", ");
      const updates = [
        ...fields.map((field) => `${field} = EXCLUDED.${field}`),
        "updated_at = NOW()",
      ].join(", ");

      const result = await pool.query<UserProfile>(
        `
          INSERT INTO user_profiles (${columns})
          VALUES (${placeholders})
          ON CONFLICT (user_id) DO UPDATE SET ${updates}
          RETURNING *;
        `,
        [userId, ...values],
      );

      return result.rows[0];
    },
  };
}
