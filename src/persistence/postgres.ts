// pattern: Imperative Shell

/**
 * PersistenceProvider over a pg Pool, and the runner for the ordered `.sql` files in
 * `migrations/`. Each migration commits together with its row in `schema_migrations`.
 */

import { Pool } from "pg";
import type { PoolClient } from "pg";
import { readFileSync, readdirSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import type { PersistenceProvider, QueryFunction } from "./types.ts";
import type { DatabaseConfig } from "../config/config.ts";
import type { Logger } from "../logging/logger.ts";

const MIGRATIONS_DIR = join(dirname(fileURLToPath(import.meta.url)), "migrations");

const MIGRATIONS_TABLE =
  "CREATE TABLE IF NOT EXISTS schema_migrations (name TEXT PRIMARY KEY, applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW())";

/**
 * Migration files still to apply, in file-name order. Files other than `.sql` are ignored.
 */
export function pendingMigrations(files: ReadonlyArray<string>, applied: ReadonlyArray<string>): Array<string> {
  const done = new Set(applied);
  return files.filter((file) => file.endsWith(".sql") && !done.has(file)).sort();
}

function clientQuery(client: PoolClient): QueryFunction {
  return async <T extends Record<string, unknown>>(sql: string, params: ReadonlyArray<unknown> = []) => {
    const { rows } = await client.query<T>(sql, [...params]);
    return rows;
  };
}

export function createPostgresProvider(config: DatabaseConfig, logger: Logger): PersistenceProvider {
  const pool = new Pool({ connectionString: config.url });

  pool.on("error", (error) => {
    logger.error({ err: error }, "idle postgres client error");
  });

  const query: QueryFunction = async <T extends Record<string, unknown>>(
    sql: string,
    params: ReadonlyArray<unknown> = [],
  ) => {
    const { rows } = await pool.query<T>(sql, [...params]);
    return rows;
  };

  async function withTransaction<T>(fn: (query: QueryFunction) => Promise<T>): Promise<T> {
    const client = await pool.connect();
    try {
      await client.query("BEGIN");
      const result = await fn(clientQuery(client));
      await client.query("COMMIT");
      return result;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  return {
    async connect(): Promise<void> {
      const client = await pool.connect();
      client.release();
      logger.debug("connected to postgres");
    },

    async disconnect(): Promise<void> {
      await pool.end();
    },

    async runMigrations(): Promise<void> {
      await query(MIGRATIONS_TABLE);
      const applied = await query<{ name: string }>("SELECT name FROM schema_migrations");
      const pending = pendingMigrations(
        readdirSync(MIGRATIONS_DIR),
        applied.map((row) => row.name),
      );

      for (const file of pending) {
        const sql = readFileSync(join(MIGRATIONS_DIR, file), "utf-8");
        await withTransaction(async (tx) => {
          await tx(sql);
          await tx("INSERT INTO schema_migrations (name) VALUES ($1)", [file]);
        });
        logger.info({ migration: file }, "applied migration");
      }
      logger.debug({ applied: pending.length }, "migrations up to date");
    },

    query,
    withTransaction,
  };
}
