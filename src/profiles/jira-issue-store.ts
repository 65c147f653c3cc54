import type { Logger } from "pino";
import type { Sql } from "../db/client.ts";
import type { JiraIssue } from "../context/types.ts";
import { projectKeyOf } from "../context/types.ts";
import type { JiraIssueRecord, JiraIssueStore } from "./types.ts";

type JiraIssueRow = {
  id: string;
  issue_key: string;
  project_key: string;
  summary: string;
  description: string | null;
  issue_type: string;
  status: string;
  priority: string | null;
  labels: string[] | null;
  assignee_account_id: string | null;
  assignee_display_name: string | null;
  assignee_email: string | null;
  reporter_account_id: string | null;
  issue_created_at: string | Date | null;
  issue_updated_at: string | Date | null;
  resolved_at: string | Date | null;
};

function toDate(value: string | Date | null): Date | null {
  return value === null ? null : new Date(value);
}

function rowToRecord(row: JiraIssueRow): JiraIssueRecord {
  return {
    id: row.id,
    key: row.issue_key,
    projectKey: row.project_key,
    summary: row.summary,
    description: row.description,
    issueType: row.issue_type,
    status: row.status,
    priority: row.priority,
    labels: row.labels ?? [],
    assigneeAccountId: row.assignee_account_id,
    assigneeDisplayName: row.assignee_display_name,
    assigneeEmail: row.assignee_email,
    reporterAccountId: row.reporter_account_id,
    createdAt: toDate(row.issue_created_at),
    updatedAt: toDate(row.issue_updated_at),
    resolvedAt: toDate(row.resolved_at),
  };
}

export function toJiraIssueRecord(issue: JiraIssue): JiraIssueRecord {
  return {
    id: issue.id,
    key: issue.key,
    projectKey: projectKeyOf(issue.key),
    summary: issue.summary,
    description: issue.description,
    issueType: issue.issueType,
    status: issue.status,
    priority: issue.priority,
    labels: [...issue.labels],
    assigneeAccountId: issue.assignee?.accountId ?? null,
    assigneeDisplayName: issue.assignee?.displayName ?? null,
    assigneeEmail: issue.assignee?.emailAddress ?? null,
    reporterAccountId: issue.reporter?.accountId ?? null,
    createdAt: issue.created,
    updatedAt: issue.updated,
    resolvedAt: issue.resolved,
  };
}

export function createPgJiraIssueStore(opts: {
  sql: Sql;
  logger: Logger;
}): JiraIssueStore {
  const { sql, logger } = opts;

  return {
    async upsert(issue: JiraIssue): Promise<{ wasCreated: boolean }> {
      const r = toJiraIssueRecord(issue);
      const rows = await sql`
        INSERT INTO jira_issues (
          id, issue_key, project_key, summary, description,
          issue_type, status, priority, labels,
          assignee_account_id, assignee_display_name, assignee_email, reporter_account_id,
          issue_created_at, issue_updated_at, resolved_at
        ) VALUES (
          ${r.id}, ${r.key}, ${r.projectKey}, ${r.summary}, ${r.description},
          ${r.issueType}, ${r.status}, ${r.priority}, ${r.labels},
          ${r.assigneeAccountId}, ${r.assigneeDisplayName}, ${r.assigneeEmail}, ${r.reporterAccountId},
          ${r.createdAt}, ${r.updatedAt}, ${r.resolvedAt}
        )
        ON CONFLICT (id) DO UPDATE SET
          issue_key = EXCLUDED.issue_key,
          project_key = EXCLUDED.project_key,
          summary = EXCLUDED.summary,
          description = EXCLUDED.description,
          issue_type = EXCLUDED.issue_type,
          status = EXCLUDED.status,
          priority = EXCLUDED.priority,
          labels = EXCLUDED.labels,
          assignee_account_id = EXCLUDED.assignee_account_id,
          assignee_display_name = EXCLUDED.assignee_display_name,
          assignee_email = EXCLUDED.assignee_email,
          reporter_account_id = EXCLUDED.reporter_account_id,
          issue_created_at = EXCLUDED.issue_created_at,
          issue_updated_at = EXCLUDED.issue_updated_at,
          resolved_at = EXCLUDED.resolved_at,
          synced_at = now()
        RETURNING (xmax = 0) AS inserted
      `;

      const wasCreated = Boolean(rows[0]?.inserted);
      logger.debug({ issueKey: r.key, wasCreated }, "Jira issue upserted");
      return { wasCreated };
    },

    async delete(issueId: string): Promise<boolean> {
      const rows = await sql`
        DELETE FROM jira_issues WHERE id = ${issueId} RETURNING id
      `;
      return rows.length > 0;
    },

    async listByAssignee(accountId: string): Promise<JiraIssueRecord[]> {
      const rows = await sql`
        SELECT * FROM jira_issues
        WHERE assignee_account_id = ${accountId}
        ORDER BY issue_key ASC
      `;
      return rows.map((row) => rowToRecord(row as unknown as JiraIssueRow));
    },
  };
}

/** In-process JiraIssueStore keyed by issue id. */
export function createInMemoryJiraIssueStore(): JiraIssueStore & {
  records: Map<string, JiraIssueRecord>;
} {
  const records = new Map<string, JiraIssueRecord>();

  return {
    records,

    async upsert(issue: JiraIssue) {
      const wasCreated = !records.has(issue.id);
      records.set(issue.id, toJiraIssueRecord(issue));
      return { wasCreated };
    },

    async delete(issueId: string) {
      return records.delete(issueId);
    },

    async listByAssignee(accountId: string) {
      return [...records.values()]
        .filter((r) => r.assigneeAccountId === accountId)
        .sort((a, b) => a.key.localeCompare(b.key));
    },
  };
}
