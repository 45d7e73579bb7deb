import { Pool, type PoolClient } from "pg";

export function createPool(connectionString: string): Pool {
  const pool = new Pool({ connectionString });

  pool.on("error", (err) => {
    console.error("Unexpected error on idle client", err);
  });

  return pool;
}

export async function withTransaction<T>(
  pool: Pool,
  work: (client: PoolClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();

  try {
    await client.query("BEGIN");
    const result = await work(client);
    await client.query("COMMIT");
    return result;
  } catch (err) {
    await client.query("ROLLBACK");
    throw err;
  } finally {
    client.release();
  }
}

/**
 * Takes a row lock on the owner so that concurrent writes to one user's
 * ledger commit one after another.
 */
export async function lockUser(client: PoolClient, userId: string): Promise<void> {
  await client.query(`SELECT id FROM users WHERE id = $1 FOR UPDATE`, [userId]);
}

/** Postgres unique_violation (23505), optionally on one named constraint. */
export function isUniqueViolation(err: unknown, constraint?: string): boolean {
  if (!(err instanceof Error) || !("code" in err) || err.code !== "23505") {
    return false;
  }

  return constraint === undefined || ("constraint" in err && err.constraint === constraint);
}

export async function pingDatabase(pool: Pool): Promise<boolean> {
  try {
    const result = await pool.query<{ ok: number }>("SELECT 1 AS ok");
    return result.rows[0]?.ok === 1;
  } catch (err) {
    console.error("Database ping failed:", err);
    return false;
  }
}
