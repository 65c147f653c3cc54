import type { GithubPullRequest, GithubUserRef } from "../context/types.ts";
import type { GithubIdentity, JiraIdentity } from "../identity/types.ts";

export type SyncStatus = "completed" | "completed_with_errors" | "failed";

export type SyncResult = {
  status: SyncStatus;
  /** Author logins (GitHub) or project keys (Jira) covered by the run. */
  scope: string[];
  itemsSynced: number;
  created: number;
  updated: number;
  embeddingsGenerated: number;
  errors: string[];
  durationSeconds: number;
};

/** PRs read for one author, plus one message per repository or PR that could not be read. */
export type PullRequestListing = {
  pullRequests: GithubPullRequest[];
  errors: string[];
};

/** Where pull requests come from. */
export interface PullRequestSource {
  listOrgMembers(): Promise<GithubIdentity[]>;
  /** Closed PRs authored by `author` across the organization, newest first. */
  listClosedPullRequests(author: GithubUserRef, maxPrs: number): Promise<PullRequestListing>;
}

export type IssueSearchParams = {
  projectKey: string;
  maxResults: number;
  includeClosed: boolean;
};

/** Where Jira issues come from. Issues are returned as raw REST payloads. */
export interface JiraIssueSource {
  readonly siteUrl: string;
  listProjectKeys(): Promise<string[]>;
  searchIssues(params: IssueSearchParams): Promise<unknown[]>;
  getIssue(issueKey: string): Promise<unknown>;
  listUsers(): Promise<JiraIdentity[]>;
}
