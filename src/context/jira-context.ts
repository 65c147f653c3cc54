import { stripJiraMarkup } from "./markup.ts";
import { projectKeyOf, type ContextRecord, type JiraIssue } from "./types.ts";

export const MAX_ISSUE_DESCRIPTION_CHARS = 1500;
export const MAX_KEY_COMMENTS = 3;
export const MAX_COMMENT_CHARS = 200;

export function issueEntityId(issueId: string): string {
  return `jira-issue:${issueId}`;
}

export function issueBrowseUrl(siteUrl: string, issueKey: string): string {
  return `${siteUrl.replace(/\/+$/, "")}/browse/${issueKey}`;
}

/**
 * Build the canonical context text for a Jira issue. One `HEADER: value`
 * line per field; PRIORITY, LABELS, DESCRIPTION and KEY_COMMENTS are
 * omitted when empty.
 */
export function buildJiraIssueContext(issue: JiraIssue, siteUrl: string): ContextRecord {
  const description = issue.description
    ? stripJiraMarkup(issue.description).slice(0, MAX_ISSUE_DESCRIPTION_CHARS)
    : "";

  const parts = [
    `ISSUE_TYPE: ${issue.issueType}`,
    `SUMMARY: ${issue.summary}`,
    `STATUS: ${issue.status}`,
  ];
  if (issue.priority) parts.push(`PRIORITY: ${issue.priority}`);
  if (issue.labels.length > 0) parts.push(`LABELS: ${issue.labels.join(", ")}`);
  if (description) parts.push(`DESCRIPTION: ${description}`);
  if (issue.comments.length > 0) {
    const excerpts = issue.comments
      .slice(0, MAX_KEY_COMMENTS)
      .map((c) => c.body.slice(0, MAX_COMMENT_CHARS));
    parts.push(`KEY_COMMENTS: ${excerpts.join(" | ")}`);
  }

  const projectKey = projectKeyOf(issue.key);

  return {
    entityId: issueEntityId(issue.id),
    sourceKind: "ISSUE",
    ownerIdentity: issue.assignee?.accountId ?? null,
    scope: projectKey,
    title: `${issue.key}: ${issue.summary}`,
    url: issueBrowseUrl(siteUrl, issue.key),
    rawContext: parts.join("\n"),
    metadata: {
      issueKey: issue.key,
      projectKey,
      issueType: issue.issueType,
      status: issue.status,
      priority: issue.priority,
      labels: issue.labels,
      reporterAccountId: issue.reporter?.accountId ?? null,
    },
  };
}
