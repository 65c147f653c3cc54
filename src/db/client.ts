import postgres from "postgres";
import type { Logger } from "pino";
import { ConfigurationError } from "../lib/errors.ts";

export type Sql = ReturnType<typeof postgres>;

export type DbClient = {
  sql: Sql;
  close(): Promise<void>;
};

const DEFAULT_MAX_CONNECTIONS = 10;

/**
 * postgres.js pool for the embedding, issue and profile tables.
 * Connections open lazily on the first query.
 */
export function createDbClient(opts: {
  connectionString: string | undefined;
  logger: Logger;
  maxConnections?: number;
}): DbClient {
  const { connectionString, logger } = opts;

  if (!connectionString) {
    throw new ConfigurationError(
      "DATABASE_URL is not set. Set DATABASE_URL or pass connectionString to createDbClient().",
      "databaseUrl",
    );
  }

  const max = opts.maxConnections ?? DEFAULT_MAX_CONNECTIONS;
  const sql = postgres(connectionString, {
    max,
    idle_timeout: 20,
    connect_timeout: 10,
    // CREATE EXTENSION IF NOT EXISTS and friends emit notices
    onnotice: () => {},
  });

  logger.debug({ max }, "PostgreSQL client created");

  return {
    sql,
    async close() {
      await sql.end();
      logger.debug("PostgreSQL client closed");
    },
  };
}
