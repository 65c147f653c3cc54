import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { Logger } from "pino";
import type { Sql } from "./client.ts";

export const MIGRATIONS_DIR = fileURLToPath(new URL("./migrations", import.meta.url));

export function listMigrationFiles(dir: string = MIGRATIONS_DIR): string[] {
  return readdirSync(dir)
    .filter((f) => f.endsWith(".sql") && !f.endsWith(".down.sql"))
    .sort();
}

/**
 * Apply all pending migrations in order.
 *
 * Each migration is run inside a transaction. The `_migrations` table is
 * created by 001-initial-schema.sql, so the first run treats a failed lookup
 * as "nothing applied yet".
 */
export async function runMigrations(sql: Sql, logger: Logger): Promise<string[]> {
  const files = listMigrationFiles();
  const appliedNow: string[] = [];

  if (files.length === 0) {
    logger.info("No migration files found");
    return appliedNow;
  }

  let applied: Set<string>;
  try {
    const rows = await sql`SELECT name FROM _migrations`;
    applied = new Set(rows.map((r) => String(r.name)));
  } catch (err) {
    logger.debug({ err }, "_migrations table not found, treating as first run");
    applied = new Set();
  }

  for (const file of files) {
    if (applied.has(file)) {
      logger.debug({ file }, "Migration already applied");
      continue;
    }

    const sqlContent = readFileSync(join(MIGRATIONS_DIR, file), "utf-8");
    logger.info({ file }, "Applying migration");

    await sql.begin(async (tx) => {
      await tx.unsafe(sqlContent);
      // unsafe() because TransactionSql's Omit<> strips call signatures
      await tx.unsafe("INSERT INTO _migrations (name) VALUES ($1)", [file]);
    });
    appliedNow.push(file);
  }

  logger.info({ applied: appliedNow.length }, "Migrations complete");
  return appliedNow;
}

/**
 * Roll back applied migrations with a numeric prefix greater than
 * `targetVersion`, newest first, using their `.down.sql` files.
 * `targetVersion = 0` rolls back everything.
 */
export async function runRollback(sql: Sql, targetVersion: number, logger: Logger): Promise<void> {
  const rows = await sql`SELECT id, name FROM _migrations ORDER BY id DESC`;

  if (rows.length === 0) {
    logger.info("No migrations to roll back");
    return;
  }

  for (const row of rows) {
    const name = String(row.name);
    const versionStr = name.match(/^(\d+)/)?.[1];
    if (!versionStr) {
      logger.warn({ name }, "Skipping migration without version prefix");
      continue;
    }

    if (parseInt(versionStr, 10) <= targetVersion) break;

    const downFile = name.replace(/\.sql$/, ".down.sql");
    let downSql: string;
    try {
      downSql = readFileSync(join(MIGRATIONS_DIR, downFile), "utf-8");
    } catch (err) {
      throw new Error(`Missing rollback file: ${downFile} (required to roll back ${name})`, {
        cause: err,
      });
    }

    logger.info({ name }, "Rolling back migration");

    await sql.begin(async (tx) => {
      // Record goes first: the 001 down file drops _migrations itself.
      await tx.unsafe("DELETE FROM _migrations WHERE name = $1", [name]);
      await tx.unsafe(downSql);
    });
  }

  logger.info("Rollback complete");
}
