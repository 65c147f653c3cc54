export { loadConfig, requireDatabaseUrl, requireGithub, requireJira } from "./config.ts";
export type { AppConfig, GithubCredentials, JiraCredentials } from "./config.ts";

export { createTaskMatchCore } from "./core.ts";
export type { SearchResult, TaskMatchCore, TaskMatchCoreDeps } from "./core.ts";
export { createRuntime } from "./runtime.ts";
export type { Runtime } from "./runtime.ts";

export { createLogger, createChildLogger } from "./lib/logger.ts";
export type { Logger } from "./lib/logger.ts";
export {
  ConfigurationError,
  DataError,
  ProviderError,
  ValidationError,
  classifyError,
  describeError,
  isTaskMatchError,
} from "./lib/errors.ts";
export type { ErrorCategory, TaskMatchError } from "./lib/errors.ts";
export { ok, err, unwrap } from "./lib/result.ts";
export type { Result } from "./lib/result.ts";
export { cleanText } from "./lib/text-normalizer.ts";

export { createDbClient } from "./db/client.ts";
export type { DbClient, Sql } from "./db/client.ts";
export { runMigrations, runRollback } from "./db/migrate.ts";

export { createEmbeddingBackend, createEmbeddingProvider } from "./embedding/provider.ts";
export { createVoyageBackend } from "./embedding/voyage-backend.ts";
export { createLocalBackend } from "./embedding/local-backend.ts";
export { normalizeDimension, DEFAULT_EMBEDDING_DIMENSION } from "./embedding/dimension.ts";
export type {
  EmbeddingBackend,
  EmbeddingInputType,
  EmbeddingProvider,
  LocalEncoder,
} from "./embedding/types.ts";

export { buildPullRequestContext, pullRequestEntityId } from "./context/github-context.ts";
export { buildJiraIssueContext, issueEntityId } from "./context/jira-context.ts";
export { parseJiraIssue, richTextToPlain } from "./context/jira-parser.ts";
export type {
  ContextRecord,
  GithubPullRequest,
  JiraIssue,
  JiraUser,
  SourceKind,
} from "./context/types.ts";

export { createPgVectorStore } from "./store/pg-vector-store.ts";
export { createInMemoryVectorStore } from "./store/memory-vector-store.ts";
export { cosineSimilarity, cosineDistance } from "./store/vector-math.ts";
export type {
  EmbeddingInput,
  EmbeddingRecord,
  SimilarRecord,
  VectorFilters,
  VectorStore,
} from "./store/types.ts";

export { matchIdentities, DEFAULT_MATCH_THRESHOLD } from "./identity/identity-matcher.ts";
export { partialRatio, ratio, tokenSetRatio } from "./identity/fuzzy.ts";
export type { GithubIdentity, IdentityMatch, JiraIdentity } from "./identity/types.ts";

export { createScoreService, composeTaskText, MAX_TOP_N } from "./scoring/score-service.ts";
export type { ContributingItem, ScoreResult, ScoreService } from "./scoring/types.ts";

export {
  createInMemoryDeveloperDirectory,
  createPgDeveloperDirectory,
} from "./profiles/developer-directory.ts";
export { createInMemoryJiraIssueStore, createPgJiraIssueStore } from "./profiles/jira-issue-store.ts";
export { calculateWorkload } from "./profiles/workload.ts";
export { linkMatchedIdentities } from "./profiles/link-identities.ts";
export type { LinkIdentitiesResult } from "./profiles/link-identities.ts";
export type {
  DeveloperDirectory,
  DeveloperProfile,
  DeveloperWorkload,
  JiraIssueRecord,
  JiraIssueStore,
} from "./profiles/types.ts";

export { syncGithubPullRequests } from "./sync/github-sync.ts";
export { syncJiraIssues } from "./sync/jira-sync.ts";
export type { JiraSyncOptions } from "./sync/jira-sync.ts";
export { processJiraWebhookEvent } from "./sync/webhook.ts";
export type { JiraWebhookResult } from "./sync/webhook.ts";
export { createOctokitPullRequestSource } from "./sync/github-source.ts";
export { createJiraRestSource } from "./sync/jira-source.ts";
export type { JiraIssueSource, PullRequestSource, SyncResult, SyncStatus } from "./sync/types.ts";
