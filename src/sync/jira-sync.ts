import type { Logger } from "pino";
import { buildJiraIssueContext } from "../context/jira-context.ts";
import { parseJiraIssue } from "../context/jira-parser.ts";
import type { JiraIssue } from "../context/types.ts";
import type { EmbeddingProvider } from "../embedding/types.ts";
import { describeError } from "../lib/errors.ts";
import type { JiraIssueStore } from "../profiles/types.ts";
import type { VectorStore } from "../store/types.ts";
import { createSyncTally } from "./sync-result.ts";
import { storeContextEmbeddings } from "./store-contexts.ts";
import type { JiraIssueSource, SyncResult } from "./types.ts";

export const DEFAULT_MAX_RESULTS = 100;

export type JiraSyncOptions = {
  projectKeys?: string[];
  maxResults?: number;
  includeClosed?: boolean;
  syncComments?: boolean;
  generateEmbeddings?: boolean;
};

export function rawIssueKey(raw: unknown): string {
  if (typeof raw === "object" && raw !== null && "key" in raw && typeof raw.key === "string") {
    return raw.key;
  }
  return "unknown";
}

/**
 * Fetch issues per project, store the relational copy, then embed and
 * upsert their contexts. A failing project or issue is recorded in
 * `errors` and skipped. Project keys default to every accessible project.
 */
export async function syncJiraIssues(
  deps: {
    source: JiraIssueSource;
    provider: EmbeddingProvider;
    store: VectorStore;
    issueStore: JiraIssueStore;
    logger: Logger;
    now?: () => number;
  },
  opts: JiraSyncOptions = {},
): Promise<SyncResult> {
  const { source, provider, store, issueStore, logger } = deps;
  const maxResults = opts.maxResults ?? DEFAULT_MAX_RESULTS;
  const includeClosed = opts.includeClosed ?? true;
  const syncComments = opts.syncComments ?? true;
  const generateEmbeddings = opts.generateEmbeddings ?? true;

  const projectKeys =
    opts.projectKeys && opts.projectKeys.length > 0
      ? opts.projectKeys
      : await source.listProjectKeys();
  const tally = createSyncTally(projectKeys, deps.now);

  const synced: JiraIssue[] = [];
  for (const projectKey of projectKeys) {
    let rawIssues: unknown[];
    try {
      logger.info({ projectKey }, "Syncing Jira project");
      rawIssues = await source.searchIssues({ projectKey, maxResults, includeClosed });
    } catch (err) {
      logger.error({ err, projectKey }, "Failed to fetch Jira project issues");
      tally.recordError(`Error syncing project ${projectKey}: ${describeError(err)}`);
      continue;
    }

    for (const raw of rawIssues) {
      try {
        const issue = parseJiraIssue(raw, { includeComments: syncComments });
        const { wasCreated } = await issueStore.upsert(issue);
        tally.recordUpsert(wasCreated);
        synced.push(issue);
      } catch (err) {
        const issueKey = rawIssueKey(raw);
        logger.error({ err, issueKey }, "Failed to process Jira issue");
        tally.recordError(`Error processing issue ${issueKey}: ${describeError(err)}`);
      }
    }
  }

  if (generateEmbeddings && synced.length > 0) {
    const contexts = synced.map((issue) => buildJiraIssueContext(issue, source.siteUrl));
    const { stored, errors } = await storeContextEmbeddings({ contexts, provider, store, logger });
    for (let i = 0; i < stored.length; i++) tally.recordEmbedding();
    for (const message of errors) tally.recordError(message);
  }

  const result = tally.finish();
  logger.info(
    {
      status: result.status,
      projects: projectKeys,
      itemsSynced: result.itemsSynced,
      embeddingsGenerated: result.embeddingsGenerated,
      errors: result.errors.length,
    },
    "Jira sync finished",
  );
  return result;
}
