import { describe, test, expect, vi } from "vitest";
import type { Logger } from "pino";
import { syncGithubPullRequests } from "./github-sync.ts";
import type { PullRequestSource } from "./types.ts";
import type { GithubPullRequest, GithubUserRef } from "../context/types.ts";
import { createEmbeddingProvider } from "../embedding/provider.ts";
import type { EmbeddingBackend } from "../embedding/types.ts";
import { createInMemoryVectorStore } from "../store/memory-vector-store.ts";
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

function createFakeBackend(failTexts: string[] = []): EmbeddingBackend {
  return {
    name: "fake",
    embedBatch: vi.fn(async (texts: string[]) => {
      if (texts.some((t) => failTexts.some((f) => t.includes(f)))) {
        throw new ProviderError("rejected", { provider: "fake", status: 400 });
      }
      return texts.map((t) => [t.length, 1]);
    }),
  };
}

function makePr(id: number, author: GithubUserRef | null, overrides: Partial<GithubPullRequest> = {}): GithubPullRequest {
  return {
    id,
    number: id,
    title: `Change ${id}`,
    body: null,
    htmlUrl: `https://github.com/acme/api/pull/${id}`,
    repoFullName: "acme/api",
    labels: [],
    files: [{ filename: "src/app.ts", status: "modified" }],
    commitMessages: [],
    author,
    ...overrides,
  };
}

const alice = { login: "alice", id: 1, name: "Alice", email: null };
const bob = { login: "bob", id: 2, name: null, email: null };

function createFakeSource(
  prs: Record<string, GithubPullRequest[] | Error>,
  listingErrors: Record<string, string[]> = {},
): PullRequestSource {
  return {
    listOrgMembers: vi.fn(async () => [alice, bob]),
    listClosedPullRequests: vi.fn(async (author: GithubUserRef) => {
      const result = prs[author.login] ?? [];
      if (result instanceof Error) throw result;
      return { pullRequests: result, errors: listingErrors[author.login] ?? [] };
    }),
  };
}

describe("syncGithubPullRequests", () => {
  test("embeds and stores every PR of every org member", async () => {
    const store = createInMemoryVectorStore({ dimensions: 3 });
    const source = createFakeSource({
      alice: [makePr(11, alice), makePr(12, alice)],
      bob: [makePr(21, bob)],
    });

    const result = await syncGithubPullRequests({
      source,
      provider: createEmbeddingProvider({ backend: createFakeBackend(), dimensions: 3, logger: createMockLogger() }),
      store,
      logger: createMockLogger(),
      maxPrsPerAuthor: 10,
    });

    expect(result).toMatchObject({
      status: "completed",
      scope: ["alice", "bob"],
      itemsSynced: 3,
      created: 3,
      updated: 0,
      embeddingsGenerated: 3,
      errors: [],
    });
    expect(source.listClosedPullRequests).toHaveBeenCalledWith(alice, 10);

    const record = await store.get("github-pr:11");
    expect(record?.ownerIdentity).toBe("alice");
    expect(record?.vector).toHaveLength(3);
    expect(record?.vector[2]).toBe(0);
    expect(record?.contextSnapshot.startsWith("PR_INTENT: Change 11")).toBe(true);
  });

  test("re-sync reports updates", async () => {
    const store = createInMemoryVectorStore({ dimensions: 3 });
    const deps = {
      source: createFakeSource({ alice: [makePr(11, alice)] }),
      provider: createEmbeddingProvider({ backend: createFakeBackend(), dimensions: 3, logger: createMockLogger() }),
      store,
      logger: createMockLogger(),
      authors: [alice],
    };

    await syncGithubPullRequests(deps);
    const second = await syncGithubPullRequests(deps);

    expect(second.created).toBe(0);
    expect(second.updated).toBe(1);
    expect(await store.count()).toBe(1);
  });

  test("records author, PR and embedding failures and keeps going", async () => {
    const store = createInMemoryVectorStore({ dimensions: 3 });
    const source = createFakeSource({
      alice: [makePr(11, alice), makePr(12, null), makePr(13, alice, { title: "poison" })],
      bob: new ProviderError("Not Found", { provider: "github", status: 404 }),
    });

    const result = await syncGithubPullRequests({
      source,
      provider: createEmbeddingProvider({
        backend: createFakeBackend(["poison"]),
        dimensions: 3,
        logger: createMockLogger(),
      }),
      store,
      logger: createMockLogger(),
    });

    expect(result.status).toBe("completed_with_errors");
    expect(result.itemsSynced).toBe(1);
    expect(result.errors).toEqual([
      "Error processing pull request acme/api#12: PR #12 in acme/api has no author",
      "Error fetching pull requests for bob: Not Found (status 404)",
      "Error embedding github-pr:13: rejected (status 400)",
    ]);
  });

  test("records repository and PR failures reported by the source", async () => {
    const result = await syncGithubPullRequests({
      source: createFakeSource(
        { alice: [makePr(11, alice)] },
        {
          alice: [
            "Error listing pull requests in acme/secret: Resource not accessible",
            "Error fetching pull request acme/api#10: Server Error",
          ],
        },
      ),
      provider: createEmbeddingProvider({ backend: createFakeBackend(), dimensions: 3, logger: createMockLogger() }),
      store: createInMemoryVectorStore({ dimensions: 3 }),
      logger: createMockLogger(),
      authors: [alice],
    });

    expect(result.status).toBe("completed_with_errors");
    expect(result.itemsSynced).toBe(1);
    expect(result.errors).toEqual([
      "Error listing pull requests in acme/secret: Resource not accessible",
      "Error fetching pull request acme/api#10: Server Error",
    ]);
  });

  test("fails when nothing could be synced", async () => {
    const result = await syncGithubPullRequests({
      source: createFakeSource({ alice: new Error("boom"), bob: new Error("boom") }),
      provider: createEmbeddingProvider({ backend: createFakeBackend(), dimensions: 3, logger: createMockLogger() }),
      store: createInMemoryVectorStore({ dimensions: 3 }),
      logger: createMockLogger(),
    });

    expect(result.status).toBe("failed");
    expect(result.errors).toHaveLength(2);
  });
});
