import { describe, test, expect, vi } from "vitest";
import type { Logger } from "pino";
import { processJiraWebhookEvent } from "./webhook.ts";
import type { JiraIssueSource } from "./types.ts";
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

const fullIssue = {
  id: "10001",
  key: "OPS-12",
  fields: {
    summary: "Rotate database credentials",
    issuetype: { name: "Task" },
    status: { name: "In Progress" },
    priority: { name: "High" },
    assignee: { accountId: "acc-1", displayName: "Jane Smith" },
  },
};

function setup(getIssue: () => Promise<unknown> = async () => fullIssue) {
  const source: JiraIssueSource = {
    siteUrl: "https://acme.atlassian.net",
    listProjectKeys: vi.fn(async () => []),
    searchIssues: vi.fn(async () => []),
    getIssue: vi.fn(getIssue),
    listUsers: vi.fn(async () => []),
  };
  const deps = {
    source,
    provider: createEmbeddingProvider({ backend, dimensions: 3, logger: createMockLogger() }),
    store: createInMemoryVectorStore({ dimensions: 3 }),
    issueStore: createInMemoryJiraIssueStore(),
    logger: createMockLogger(),
  };
  return deps;
}

describe("processJiraWebhookEvent", () => {
  test("issue_created re-fetches the issue and stores it with its embedding", async () => {
    const deps = setup();

    const result = await processJiraWebhookEvent(deps, {
      webhookEvent: "jira:issue_created",
      issue: { id: "10001", key: "OPS-12" },
    });

    expect(result).toEqual({
      eventType: "jira:issue_created",
      processed: true,
      issueKey: "OPS-12",
      action: "created",
    });
    expect(deps.source.getIssue).toHaveBeenCalledWith("OPS-12");
    expect(deps.issueStore.records.get("10001")?.status).toBe("In Progress");
    expect((await deps.store.get("jira-issue:10001"))?.ownerIdentity).toBe("acc-1");
  });

  test("issue_updated on a known issue reports an update", async () => {
    const deps = setup();
    const event = { webhookEvent: "jira:issue_updated", issue: { id: "10001", key: "OPS-12" } };

    await processJiraWebhookEvent(deps, event);
    const result = await processJiraWebhookEvent(deps, event);

    expect(result.action).toBe("updated");
    expect(await deps.store.count()).toBe(1);
  });

  test("issue_deleted removes the issue and its embedding", async () => {
    const deps = setup();
    await processJiraWebhookEvent(deps, { webhookEvent: "jira:issue_created", issue: { id: "10001", key: "OPS-12" } });

    const result = await processJiraWebhookEvent(deps, {
      webhookEvent: "jira:issue_deleted",
      issue: { id: "10001", key: "OPS-12" },
    });

    expect(result).toEqual({
      eventType: "jira:issue_deleted",
      processed: true,
      issueKey: "OPS-12",
      action: "deleted",
    });
    expect(deps.issueStore.records.size).toBe(0);
    expect(await deps.store.get("jira-issue:10001")).toBeNull();
  });

  test("unhandled events and events without an issue are not processed", async () => {
    const deps = setup();

    expect(await processJiraWebhookEvent(deps, { webhookEvent: "comment_created", issue: { id: "1", key: "OPS-1" } })).toEqual({
      eventType: "comment_created",
      processed: false,
    });
    expect(await processJiraWebhookEvent(deps, { webhookEvent: "jira:issue_created" })).toEqual({
      eventType: "jira:issue_created",
      processed: false,
    });
  });

  test("malformed payloads are rejected without throwing", async () => {
    const result = await processJiraWebhookEvent(setup(), { nope: true });
    expect(result).toEqual({ eventType: "unknown", processed: false, error: "Malformed webhook payload" });
  });

  test("fetch failures are reported in the result", async () => {
    const deps = setup(async () => {
      throw new ProviderError("Jira API error: /issue/OPS-12", { provider: "jira", status: 404 });
    });

    const result = await processJiraWebhookEvent(deps, {
      webhookEvent: "jira:issue_updated",
      issue: { id: "10001", key: "OPS-12" },
    });

    expect(result).toEqual({
      eventType: "jira:issue_updated",
      processed: false,
      issueKey: "OPS-12",
      error: "Jira API error: /issue/OPS-12 (status 404)",
    });
  });
});
