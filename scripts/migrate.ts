/**
 * Apply or roll back database migrations.
 *
 * Usage:
 *   tsx scripts/migrate.ts                 # apply pending migrations
 *   tsx scripts/migrate.ts --down 0        # roll back everything
 *
 * Environment:
 *   DATABASE_URL   PostgreSQL connection string (required)
 */

import { parseArgs } from "node:util";
import { loadConfig, requireDatabaseUrl } from "../src/config.ts";
import { createDbClient } from "../src/db/client.ts";
import { runMigrations, runRollback } from "../src/db/migrate.ts";
import { createLogger } from "../src/lib/logger.ts";

const { values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    down: { type: "string" },
    help: { type: "boolean" },
  },
});

if (values.help) {
  console.log(`
Usage: tsx scripts/migrate.ts [--down <version>]

Options:
  --down <version>   Roll back migrations newer than <version> (0 = all)
  --help             Show this help
`);
  process.exit(0);
}

async function main(): Promise<void> {
  const config = loadConfig();
  if (!config.ok) {
    console.error(`ERROR: ${config.error.message}`);
    process.exit(1);
  }
  const logger = createLogger(config.value.logLevel);

  const databaseUrl = requireDatabaseUrl(config.value);
  if (!databaseUrl.ok) {
    console.error(`ERROR: ${databaseUrl.error.message}`);
    process.exit(1);
  }

  const db = createDbClient({ connectionString: databaseUrl.value, logger });
  try {
    if (values.down !== undefined) {
      const target = Number.parseInt(values.down, 10);
      if (!Number.isInteger(target) || target < 0) {
        console.error(`ERROR: --down expects a non-negative version, got "${values.down}"`);
        process.exitCode = 1;
        return;
      }
      await runRollback(db.sql, target, logger);
    } else {
      const applied = await runMigrations(db.sql, logger);
      console.log(applied.length > 0 ? `Applied: ${applied.join(", ")}` : "Database is up to date.");
    }
  } finally {
    await db.close();
  }
}

await main();
