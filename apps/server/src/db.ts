import { readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import type { FastifyBaseLogger } from "fastify";
import { Pool } from "pg";
import type { z } from "zod";

/** The slice of `pg.Pool` the stores use. Rows are validated before use. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export type RowSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * An idle client that loses its connection emits `error` on the pool; with a
 * logger attached the process logs it instead of crashing.
 */
export function createPool(databaseUrl: string, logger?: Pick<FastifyBaseLogger, "error">): Pool {
  const pool = new Pool({ connectionString: databaseUrl, max: 25 });
  if (logger) {
    pool.on("error", (error) => {
      logger.error({ err: error }, "idle database client error");
    });
  }
  return pool;
}

export async function runMigrations(pool: Queryable): Promise<void> {
  const currentDir = dirname(fileURLToPath(import.meta.url));
  const candidates = [
    join(currentDir, "migrations.sql"),
    join(currentDir, "../src/migrations.sql"),
    join(process.cwd(), "apps/server/src/migrations.sql")
  ];

  let sql: string | null = null;
  for (const candidate of candidates) {
    try {
      sql = await readFile(candidate, "utf8");
      break;
    } catch (error) {
      const message = String(error);
      if (!message.includes("ENOENT")) {
        throw error;
      }
    }
  }

  if (!sql) {
    throw new Error(`Unable to locate migrations.sql. Tried: ${candidates.join(", ")}`);
  }

  await pool.query(sql);
}

export async function one<T>(
  pool: Queryable,
  schema: RowSchema<T>,
  queryText: string,
  values: unknown[] = []
): Promise<T | null> {
  const result = await pool.query(queryText, values);
  const row = result.rows[0];
  return row === undefined ? null : schema.parse(row);
}

export async function many<T>(
  pool: Queryable,
  schema: RowSchema<T>,
  queryText: string,
  values: unknown[] = []
): Promise<T[]> {
  const result = await pool.query(queryText, values);
  return result.rows.map((row) => schema.parse(row));
}
