import { Octokit } from "@octokit/rest";
import type { Logger } from "pino";
import type { AppConfig } from "./config.ts";
import { createTaskMatchCore, type TaskMatchCore } from "./core.ts";
import { createDbClient, type DbClient } from "./db/client.ts";
import { createEmbeddingBackend, createEmbeddingProvider } from "./embedding/provider.ts";
import type { LocalEncoder } from "./embedding/types.ts";
import type { ConfigurationError } from "./lib/errors.ts";
import { err, ok, type Result } from "./lib/result.ts";
import {
  createInMemoryDeveloperDirectory,
  createPgDeveloperDirectory,
} from "./profiles/developer-directory.ts";
import { createInMemoryJiraIssueStore, createPgJiraIssueStore } from "./profiles/jira-issue-store.ts";
import type { DeveloperDirectory, JiraIssueStore } from "./profiles/types.ts";
import { createInMemoryVectorStore } from "./store/memory-vector-store.ts";
import { createPgVectorStore } from "./store/pg-vector-store.ts";
import type { VectorStore } from "./store/types.ts";
import { createOctokitPullRequestSource } from "./sync/github-source.ts";
import { createJiraRestSource } from "./sync/jira-source.ts";

export type Runtime = {
  core: TaskMatchCore;
  directory: DeveloperDirectory;
  /** Null when running on the in-memory stores. */
  db: DbClient | null;
  close(): Promise<void>;
};

/**
 * Build the core from parsed configuration. Without DATABASE_URL the
 * stores are in-memory and nothing outlives the process.
 */
export function createRuntime(
  config: AppConfig,
  logger: Logger,
  deps: { localEncoder?: LocalEncoder } = {},
): Result<Runtime, ConfigurationError> {
  const backend = createEmbeddingBackend(config.embedding, {
    logger: logger.child({ module: "embedding" }),
    localEncoder: deps.localEncoder,
  });
  if (!backend.ok) return err(backend.error);

  const provider = createEmbeddingProvider({
    backend: backend.value,
    dimensions: config.embedding.dimensions,
    logger: logger.child({ module: "embedding" }),
  });

  let db: DbClient | null = null;
  let store: VectorStore;
  let directory: DeveloperDirectory;
  let issueStore: JiraIssueStore;

  if (config.databaseUrl) {
    db = createDbClient({ connectionString: config.databaseUrl, logger });
    store = createPgVectorStore({ sql: db.sql, dimensions: config.embedding.dimensions, logger });
    directory = createPgDeveloperDirectory({ sql: db.sql, logger });
    issueStore = createPgJiraIssueStore({ sql: db.sql, logger });
  } else {
    logger.warn("DATABASE_URL not set, using in-memory stores");
    store = createInMemoryVectorStore({ dimensions: config.embedding.dimensions });
    directory = createInMemoryDeveloperDirectory();
    issueStore = createInMemoryJiraIssueStore();
  }

  const pullRequestSource = config.github
    ? createOctokitPullRequestSource({
        octokit: new Octokit({ auth: config.github.token }),
        org: config.github.org,
        logger: logger.child({ module: "github" }),
      })
    : undefined;

  const jiraSource = config.jira
    ? createJiraRestSource({
        siteUrl: config.jira.url,
        email: config.jira.email,
        apiToken: config.jira.apiToken,
        logger: logger.child({ module: "jira" }),
      })
    : undefined;

  const core = createTaskMatchCore({
    store,
    provider,
    directory,
    issueStore,
    logger,
    pullRequestSource,
    jiraSource,
    scoring: config.scoring,
  });

  return ok({
    core,
    directory,
    db,
    async close() {
      await db?.close();
    },
  });
}
