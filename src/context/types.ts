/**
 * Narrow views of the integration records the core consumes, and the
 * canonical context record built from them. Only the fields read by the
 * context builders are modelled; SDK objects are mapped onto these shapes
 * by the sources in src/sync/.
 */

export type SourceKind = "PR" | "ISSUE";

export type ContextRecord = {
  /** `github-pr:<id>` or `jira-issue:<id>`; unique across sources. */
  entityId: string;
  sourceKind: SourceKind;
  /** GitHub login of the PR author, or Jira account id of the assignee. */
  ownerIdentity: string | null;
  /** Repository full name for PRs, project key for issues. */
  scope: string;
  title: string;
  url: string;
  rawContext: string;
  metadata: Record<string, unknown>;
};

// ── GitHub ──────────────────────────────────────────────────────────────────

export type GithubUserRef = {
  login: string;
  id: number;
};

export type GithubFileStatus =
  | "added"
  | "removed"
  | "modified"
  | "renamed"
  | "copied"
  | "changed"
  | "unchanged";

export type GithubPullRequest = {
  id: number;
  number: number;
  title: string;
  body: string | null;
  htmlUrl: string;
  repoFullName: string;
  labels: string[];
  files: Array<{ filename: string; status: GithubFileStatus }>;
  commitMessages: string[];
  author: GithubUserRef | null;
};

// ── Jira ────────────────────────────────────────────────────────────────────

export type JiraUser = {
  accountId: string;
  displayName: string | null;
  emailAddress: string | null;
  active: boolean;
};

export type JiraComment = {
  id: string;
  author: JiraUser | null;
  body: string;
  created: Date;
  updated: Date | null;
};

export type JiraIssue = {
  id: string;
  key: string;
  summary: string;
  description: string | null;
  issueType: string;
  status: string;
  priority: string | null;
  labels: string[];
  assignee: JiraUser | null;
  reporter: JiraUser | null;
  comments: JiraComment[];
  created: Date | null;
  updated: Date | null;
  resolved: Date | null;
};

export function projectKeyOf(issueKey: string): string {
  return issueKey.split("-")[0] ?? issueKey;
}
