import { describe, test, expect, vi } from "vitest";
import type { Logger } from "pino";
import { rawIssueKey, syncJiraIssues } from "./jira-sync.ts";
import type { IssueSearchParams, JiraIssueSource } from "./types.ts";
import { createEmbeddingProvider } from "../embedding/provider.ts";
import type { EmbeddingBackend } from "../embedding/types.ts";
import { createInMemoryVectorStore } from "../store/memory-vector-store.ts";
import { createInMemoryJiraIssueStore } from "../profiles/jira-issue-store.ts";
import { ProviderError } from "../lib/errors.ts";

function createMockLogger(): Logger {
  return {
    warn: () => {},
    info: () => {},
    debug: () => {},
    error: () => {},
    child: () => createMockLogger(),
  } as unknown as Logger;
}

const backend: EmbeddingBackend = {
  name: "fake",
  embedBatch: async (texts: string[]) => texts.map((t) => [t.length, 1]),
};

function issuePayload(n: number, overrides: Record<string, unknown> = {}) {
  return {
    id: String(10_000 + n),
    key: `OPS-${n}`,
    fields: {
      summary: `Issue number ${n}`,
      description: "Plain description",
      issuetype: { name: "Task" },
      status: { name: "To Do" },
      priority: { name: "Medium" },
      labels: [],
      assignee: { accountId: "acc-1", displayName: "Jane Smith" },
      reporter: null,
      created: "2025-02-01T09:00:00.000+0000",
      updated: null,
      resolutiondate: null,
      comment: { comments: [] },
      ...overrides,
    },
  };
}

function createFakeSource(byProject: Record<string, unknown[] | Error>): JiraIssueSource {
  return {
    siteUrl: "https://acme.atlassian.net",
    listProjectKeys: vi.fn(async () => Object.keys(byProject)),
    searchIssues: vi.fn(async (params: IssueSearchParams) => {
      const issues = byProject[params.projectKey] ?? [];
      if (issues instanceof Error) throw issues;
      return issues;
    }),
    getIssue: vi.fn(async () => ({})),
    listUsers: vi.fn(async () => []),
  };
}

function deps(source: JiraIssueSource) {
  return {
    source,
    provider: createEmbeddingProvider({ backend, dimensions: 3, logger: createMockLogger() }),
    store: createInMemoryVectorStore({ dimensions: 3 }),
    issueStore: createInMemoryJiraIssueStore(),
    logger: createMockLogger(),
  };
}

describe("syncJiraIssues", () => {
  test("ten valid issues and one malformed issue", async () => {
    const valid = Array.from({ length: 10 }, (_, i) => issuePayload(i + 1));
    const malformed = issuePayload(11, { summary: "" });
    const d = deps(createFakeSource({ OPS: [...valid.slice(0, 5), malformed, ...valid.slice(5)] }));

    const result = await syncJiraIssues(d, { projectKeys: ["OPS"] });

    expect(result.status).toBe("completed_with_errors");
    expect(result.itemsSynced).toBe(10);
    expect(result.created).toBe(10);
    expect(result.embeddingsGenerated).toBe(10);
    expect(result.errors).toEqual([
      "Error processing issue OPS-11: Malformed Jira issue OPS-11 (fields.summary: String must contain at least 1 character(s))",
    ]);
    expect(await d.store.count({ sourceKind: "ISSUE" })).toBe(10);
    expect(d.issueStore.records.size).toBe(10);
  });

  test("passes search options and defaults to every project", async () => {
    const source = createFakeSource({ OPS: [issuePayload(1)], WEB: [] });
    const d = deps(source);

    const result = await syncJiraIssues(d, { maxResults: 25, includeClosed: false });

    expect(result.scope).toEqual(["OPS", "WEB"]);
    expect(result.status).toBe("completed");
    expect(source.searchIssues).toHaveBeenCalledWith({ projectKey: "WEB", maxResults: 25, includeClosed: false });
  });

  test("a failing project is recorded and the others still sync", async () => {
    const d = deps(
      createFakeSource({
        OPS: new ProviderError("Jira API error: /search/jql", { provider: "jira", status: 403 }),
        WEB: [issuePayload(2)],
      }),
    );

    const result = await syncJiraIssues(d, { projectKeys: ["OPS", "WEB"] });

    expect(result.itemsSynced).toBe(1);
    expect(result.errors).toEqual(["Error syncing project OPS: Jira API error: /search/jql (status 403)"]);
  });

  test("second run counts updates", async () => {
    const d = deps(createFakeSource({ OPS: [issuePayload(1), issuePayload(2)] }));

    await syncJiraIssues(d, { projectKeys: ["OPS"] });
    const second = await syncJiraIssues(d, { projectKeys: ["OPS"] });

    expect(second).toMatchObject({ itemsSynced: 2, created: 0, updated: 2, embeddingsGenerated: 2 });
  });

  test("embeddings can be skipped", async () => {
    const d = deps(createFakeSource({ OPS: [issuePayload(1)] }));

    const result = await syncJiraIssues(d, { generateEmbeddings: false });

    expect(result.itemsSynced).toBe(1);
    expect(result.embeddingsGenerated).toBe(0);
    expect(await d.store.count()).toBe(0);
  });

  test("unassigned issues are stored without an owner", async () => {
    const d = deps(createFakeSource({ OPS: [issuePayload(1, { assignee: null })] }));

    await syncJiraIssues(d);

    const record = await d.store.get("jira-issue:10001");
    expect(record?.ownerIdentity).toBeNull();
    expect(record?.scope).toBe("OPS");
    expect(record?.url).toBe("https://acme.atlassian.net/browse/OPS-1");
  });

  test("everything failing is a failed run", async () => {
    const d = deps(createFakeSource({ OPS: [issuePayload(1, { summary: "" })] }));
    const result = await syncJiraIssues(d);
    expect(result.status).toBe("failed");
  });
});

describe("rawIssueKey", () => {
  test("reads the key when present", () => {
    expect(rawIssueKey({ key: "OPS-1" })).toBe("OPS-1");
    expect(rawIssueKey({ id: 1 })).toBe("unknown");
    expect(rawIssueKey(null)).toBe("unknown");
  });
});
