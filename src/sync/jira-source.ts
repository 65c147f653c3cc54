import type { Logger } from "pino";
import { z } from "zod";
import type { JiraIdentity } from "../identity/types.ts";
import { ProviderError } from "../lib/errors.ts";
import type { IssueSearchParams, JiraIssueSource } from "./types.ts";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export const ISSUE_FIELDS = [
  "summary",
  "description",
  "issuetype",
  "status",
  "priority",
  "labels",
  "assignee",
  "reporter",
  "created",
  "updated",
  "resolutiondate",
  "comment",
] as const;

const CLOSED_STATUSES = ["Done", "Closed", "Resolved"];
const SEARCH_PAGE_SIZE = 100;
const USER_PAGE_SIZE = 1000;

const projectListSchema = z.union([
  z.array(z.object({ key: z.string() }).passthrough()),
  z.object({ values: z.array(z.object({ key: z.string() }).passthrough()) }).passthrough(),
]);

const searchPageSchema = z
  .object({
    issues: z.array(z.unknown()).default([]),
    nextPageToken: z.string().nullish(),
    isLast: z.boolean().optional(),
  })
  .passthrough();

const userListSchema = z.array(
  z
    .object({
      accountId: z.string(),
      accountType: z.string().optional(),
      displayName: z.string().nullish(),
      emailAddress: z.string().nullish(),
      active: z.boolean().optional(),
    })
    .passthrough(),
);

/** JQL for one project, optionally leaving out finished issues. */
export function buildProjectJql(projectKey: string, includeClosed: boolean): string {
  const parts = [`project = "${projectKey.replace(/"/g, '\\"')}"`];
  if (!includeClosed) {
    parts.push(`status NOT IN (${CLOSED_STATUSES.map((s) => `"${s}"`).join(", ")})`);
  }
  return `${parts.join(" AND ")} ORDER BY created ASC`;
}

/**
 * JiraIssueSource over the Jira Cloud REST API (v3) with basic auth
 * (account email + API token).
 */
export function createJiraRestSource(opts: {
  siteUrl: string;
  email: string;
  apiToken: string;
  logger: Logger;
  fetch?: FetchLike;
}): JiraIssueSource {
  const { logger } = opts;
  const siteUrl = opts.siteUrl.replace(/\/+$/, "");
  const apiUrl = `${siteUrl}/rest/api/3`;
  const doFetch: FetchLike = opts.fetch ?? ((url, init) => fetch(url, init));
  const authorization = `Basic ${Buffer.from(`${opts.email}:${opts.apiToken}`).toString("base64")}`;

  async function request<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const url = `${apiUrl}${path}`;
    let response: Response;
    try {
      response = await doFetch(url, {
        headers: {
          Authorization: authorization,
          Accept: "application/json",
        },
      });
    } catch (err) {
      throw new ProviderError(`Jira request failed: ${path}`, { provider: "jira", cause: err });
    }

    if (!response.ok) {
      const body = await response.text();
      logger.error({ status: response.status, body, path }, "Jira API returned an error");
      throw new ProviderError(`Jira API error: ${path}`, {
        provider: "jira",
        status: response.status,
        body,
      });
    }

    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError(`Unexpected Jira response shape: ${path}`, {
        provider: "jira",
        status: response.status,
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  return {
    siteUrl,

    async listProjectKeys(): Promise<string[]> {
      const data = await request("/project", projectListSchema);
      const projects = Array.isArray(data) ? data : data.values;
      return projects.map((p) => p.key);
    },

    async searchIssues(params: IssueSearchParams): Promise<unknown[]> {
      const issues: unknown[] = [];
      const jql = buildProjectJql(params.projectKey, params.includeClosed);
      let nextPageToken: string | undefined;

      while (issues.length < params.maxResults) {
        const query = new URLSearchParams({
          jql,
          maxResults: String(Math.min(SEARCH_PAGE_SIZE, params.maxResults - issues.length)),
          fields: ISSUE_FIELDS.join(","),
        });
        if (nextPageToken) query.set("nextPageToken", nextPageToken);

        const page = await request(`/search/jql?${query.toString()}`, searchPageSchema);
        issues.push(...page.issues.slice(0, params.maxResults - issues.length));

        if (page.isLast || !page.nextPageToken || page.issues.length === 0) break;
        nextPageToken = page.nextPageToken;
      }

      logger.debug({ projectKey: params.projectKey, issues: issues.length }, "Fetched Jira issues");
      return issues;
    },

    async getIssue(issueKey: string): Promise<unknown> {
      const query = new URLSearchParams({ fields: ISSUE_FIELDS.join(",") });
      return request(`/issue/${encodeURIComponent(issueKey)}?${query.toString()}`, z.unknown());
    },

    async listUsers(): Promise<JiraIdentity[]> {
      const users: JiraIdentity[] = [];
      for (let startAt = 0; ; startAt += USER_PAGE_SIZE) {
        const query = new URLSearchParams({
          startAt: String(startAt),
          maxResults: String(USER_PAGE_SIZE),
        });
        const page = await request(`/users/search?${query.toString()}`, userListSchema);

        for (const user of page) {
          // apps and customer accounts are not developers
          if (user.accountType !== undefined && user.accountType !== "atlassian") continue;
          users.push({
            accountId: user.accountId,
            displayName: user.displayName ?? null,
            emailAddress: user.emailAddress ?? null,
            active: user.active ?? true,
          });
        }

        if (page.length < USER_PAGE_SIZE) break;
      }
      return users;
    },
  };
}
