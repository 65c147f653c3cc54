import type { Logger } from "pino";
import type { GithubUserRef } from "./context/types.ts";
import type { EmbeddingProvider } from "./embedding/types.ts";
import { matchIdentities } from "./identity/identity-matcher.ts";
import type { IdentityMatch } from "./identity/types.ts";
import { ConfigurationError, ValidationError } from "./lib/errors.ts";
import type { DeveloperDirectory, DeveloperWorkload, JiraIssueStore } from "./profiles/types.ts";
import { calculateWorkload } from "./profiles/workload.ts";
import { createScoreService } from "./scoring/score-service.ts";
import type { ScoreResult } from "./scoring/types.ts";
import type { VectorFilters, VectorStore } from "./store/types.ts";
import { syncGithubPullRequests } from "./sync/github-sync.ts";
import { syncJiraIssues, type JiraSyncOptions } from "./sync/jira-sync.ts";
import type { JiraIssueSource, PullRequestSource, SyncResult } from "./sync/types.ts";
import { processJiraWebhookEvent, type JiraWebhookResult } from "./sync/webhook.ts";

export type SearchResult = {
  id: string;
  title: string;
  url: string;
  context: string;
  /** Cosine similarity, 1 - distance. */
  score: number;
};

export type TaskMatchCoreDeps = {
  store: VectorStore;
  provider: EmbeddingProvider;
  directory: DeveloperDirectory;
  issueStore: JiraIssueStore;
  logger: Logger;
  /** Absent when GitHub is not configured. */
  pullRequestSource?: PullRequestSource;
  /** Absent when Jira is not configured. */
  jiraSource?: JiraIssueSource;
  scoring?: { prWindow?: number; evidenceCount?: number };
};

export type TaskMatchCore = {
  syncGithub(opts?: {
    authors?: GithubUserRef[];
    /** Resolved against the organization members; ignored when `authors` is given. */
    authorLogins?: string[];
    maxPrsPerAuthor?: number;
  }): Promise<SyncResult>;
  syncJira(opts?: JiraSyncOptions): Promise<SyncResult>;
  searchSimilar(params: { queryText: string; limit: number; filters?: VectorFilters }): Promise<SearchResult[]>;
  scoreDevelopers(taskText: string, topN: number): Promise<ScoreResult[]>;
  matchIdentities(threshold?: number): Promise<IdentityMatch[]>;
  processJiraWebhook(payload: unknown): Promise<JiraWebhookResult>;
  workloadFor(accountId: string): Promise<DeveloperWorkload>;
};

/**
 * Wire the stores, embedding provider and sources into the operations the
 * scripts and any host service call.
 */
export function createTaskMatchCore(deps: TaskMatchCoreDeps): TaskMatchCore {
  const { store, provider, directory, issueStore, logger } = deps;

  const scoreService = createScoreService({
    store,
    embeddingProvider: provider,
    directory,
    logger: logger.child({ operation: "score" }),
    prWindow: deps.scoring?.prWindow,
    evidenceCount: deps.scoring?.evidenceCount,
  });

  function githubSource(): PullRequestSource {
    if (!deps.pullRequestSource) {
      throw new ConfigurationError(
        "GitHub integration is not configured. Set GITHUB_TOKEN and GITHUB_ORG.",
        "github",
      );
    }
    return deps.pullRequestSource;
  }

  function jiraSource(): JiraIssueSource {
    if (!deps.jiraSource) {
      throw new ConfigurationError(
        "Jira integration is not configured. Set JIRA_URL, JIRA_EMAIL and JIRA_API_TOKEN.",
        "jira",
      );
    }
    return deps.jiraSource;
  }

  return {
    async syncGithub(opts = {}) {
      const source = githubSource();
      let authors = opts.authors;
      if (!authors && opts.authorLogins) {
        const wanted = new Set(opts.authorLogins.map((login) => login.toLowerCase()));
        authors = (await source.listOrgMembers()).filter((m) => wanted.has(m.login.toLowerCase()));
      }

      return syncGithubPullRequests({
        source,
        provider,
        store,
        logger: logger.child({ operation: "sync", scope: "github" }),
        authors,
        maxPrsPerAuthor: opts.maxPrsPerAuthor,
      });
    },

    async syncJira(opts = {}) {
      return syncJiraIssues(
        {
          source: jiraSource(),
          provider,
          store,
          issueStore,
          logger: logger.child({ operation: "sync", scope: "jira" }),
        },
        opts,
      );
    },

    async searchSimilar({ queryText, limit, filters }) {
      if (!Number.isInteger(limit) || limit < 1) {
        throw new ValidationError(`limit must be a positive integer, got ${limit}`, "limit");
      }
      if (!queryText.trim()) {
        throw new ValidationError("queryText must not be empty", "queryText");
      }

      const vector = await provider.embedQuery(queryText);
      const rows = await store.querySimilar({ vector, limit, filters });
      return rows.map(({ record, similarity }) => ({
        id: record.entityId,
        title: record.title,
        url: record.url,
        context: record.contextSnapshot,
        score: similarity,
      }));
    },

    scoreDevelopers(taskText, topN) {
      return scoreService.scoreDevelopers(taskText, topN);
    },

    async matchIdentities(threshold) {
      const githubUsers = await githubSource().listOrgMembers();
      const jiraUsers = await jiraSource().listUsers();
      const matches = matchIdentities({ githubUsers, jiraUsers, threshold });
      logger.info(
        { githubUsers: githubUsers.length, jiraUsers: jiraUsers.length, matches: matches.length },
        "Identity matching finished",
      );
      return matches;
    },

    async processJiraWebhook(payload) {
      return processJiraWebhookEvent(
        {
          source: jiraSource(),
          provider,
          store,
          issueStore,
          logger: logger.child({ operation: "webhook", scope: "jira" }),
        },
        payload,
      );
    },

    async workloadFor(accountId) {
      const issues = await issueStore.listByAssignee(accountId);
      return calculateWorkload(accountId, issues);
    },
  };
}
