import type { JiraIssue } from "../context/types.ts";

export type DeveloperProfile = {
  developerId: string;
  displayName: string;
  email: string | null;
  githubLogin: string | null;
  githubId: number | null;
  jiraAccountId: string | null;
};

export type LinkIdentityParams = {
  developerId: string;
  displayName?: string;
  email?: string;
  githubLogin?: string;
  githubId?: number;
  jiraAccountId?: string;
};

export interface DeveloperDirectory {
  /** Every known developer, in a stable order. */
  listDevelopers(): Promise<DeveloperProfile[]>;
  getDeveloper(developerId: string): Promise<DeveloperProfile | null>;
  /**
   * Create the profile or fill in the given identities in one statement.
   * Fields left out keep their stored values.
   */
  linkIdentity(params: LinkIdentityParams): Promise<{ profile: DeveloperProfile; wasCreated: boolean }>;
}

/** Relational copy of a Jira issue, as used for workload accounting. */
export type JiraIssueRecord = {
  id: string;
  key: string;
  projectKey: string;
  summary: string;
  description: string | null;
  issueType: string;
  status: string;
  priority: string | null;
  labels: string[];
  assigneeAccountId: string | null;
  assigneeDisplayName: string | null;
  assigneeEmail: string | null;
  reporterAccountId: string | null;
  createdAt: Date | null;
  updatedAt: Date | null;
  resolvedAt: Date | null;
};

export interface JiraIssueStore {
  upsert(issue: JiraIssue): Promise<{ wasCreated: boolean }>;
  /** Returns true when a row was removed. */
  delete(issueId: string): Promise<boolean>;
  listByAssignee(accountId: string): Promise<JiraIssueRecord[]>;
}

export type DeveloperWorkload = {
  jiraAccountId: string;
  displayName: string | null;
  email: string | null;
  openIssues: number;
  inProgressIssues: number;
  inReviewIssues: number;
  totalActiveIssues: number;
  highPriorityCount: number;
  mediumPriorityCount: number;
  lowPriorityCount: number;
  bugsCount: number;
  tasksCount: number;
  storiesCount: number;
  otherCount: number;
  workloadScore: number;
};
