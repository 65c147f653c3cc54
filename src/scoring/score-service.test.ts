import { describe, test, expect, vi } from "vitest";
import type { Logger } from "pino";
import { composeTaskText, createScoreService, subscore } from "./score-service.ts";
import { createInMemoryVectorStore } from "../store/memory-vector-store.ts";
import { createInMemoryDeveloperDirectory } from "../profiles/developer-directory.ts";
import type { EmbeddingProvider } from "../embedding/types.ts";
import type { DeveloperProfile } from "../profiles/types.ts";
import type { EmbeddingInput, VectorStore } from "../store/types.ts";
import { ValidationError } from "../lib/errors.ts";

function createMockLogger() {
  const error = vi.fn();
  const logger = {
    warn: () => {},
    info: () => {},
    debug: () => {},
    error,
    child: () => logger,
  } as unknown as Logger;
  return { logger, error };
}

function createFakeProvider(queryVector: number[]): EmbeddingProvider {
  return {
    backendName: "fake",
    dimensions: queryVector.length,
    embed: vi.fn(async (texts: string[]) => texts.map(() => queryVector)),
    embedQuery: vi.fn(async () => queryVector),
    embedWithFallback: vi.fn(async () => ({ embedded: [], failed: [], usedFallback: false })),
  };
}

function developer(developerId: string, overrides: Partial<DeveloperProfile> = {}): DeveloperProfile {
  return {
    developerId,
    displayName: developerId.toUpperCase(),
    email: null,
    githubLogin: null,
    githubId: null,
    jiraAccountId: null,
    ...overrides,
  };
}

function embedding(
  entityId: string,
  sourceKind: "PR" | "ISSUE",
  ownerIdentity: string,
  vector: number[],
): EmbeddingInput {
  return {
    entityId,
    sourceKind,
    ownerIdentity,
    scope: sourceKind === "PR" ? "acme/api" : "OPS",
    title: `Title ${entityId}`,
    url: `https://example.test/${entityId}`,
    vector,
    contextSnapshot: `context ${entityId}`,
    metadata: {},
  };
}

async function seededStore(): Promise<VectorStore> {
  const store = createInMemoryVectorStore({ dimensions: 3 });
  await store.upsert(embedding("github-pr:1", "PR", "alice", [1, 0, 0]));
  await store.upsert(embedding("github-pr:2", "PR", "alice", [0, 1, 0]));
  await store.upsert(embedding("jira-issue:1", "ISSUE", "acc-alice", [3, 4, 0]));
  await store.upsert(embedding("github-pr:3", "PR", "bob", [4, 3, 0]));
  return store;
}

const directorySeed = [
  developer("carol"),
  developer("bob", { githubLogin: "bob" }),
  developer("dave", { githubLogin: "dave" }),
  developer("alice", { githubLogin: "alice", jiraAccountId: "acc-alice" }),
];

describe("composeTaskText", () => {
  test("joins title and description", () => {
    expect(composeTaskText(" Fix login ", " Users see a 500 ")).toBe("Fix login\nUsers see a 500");
    expect(composeTaskText("Fix login", "")).toBe("Fix login");
    expect(composeTaskText("Fix login", null)).toBe("Fix login");
  });
});

describe("subscore", () => {
  test("is mean similarity times 1000, 0 without matches", () => {
    expect(subscore([])).toBe(0);
  });
});

describe("createScoreService", () => {
  test("ranks by aggregate score and keeps developers without data at 0", async () => {
    const { logger } = createMockLogger();
    const service = createScoreService({
      store: await seededStore(),
      embeddingProvider: createFakeProvider([1, 0, 0]),
      directory: createInMemoryDeveloperDirectory(directorySeed),
      logger,
    });

    const results = await service.scoreDevelopers("Add retry to the payment client", 10);

    expect(results.map((r) => r.developerId)).toEqual(["alice", "bob", "carol", "dave"]);

    const [alice, bob, carol, dave] = results;
    expect(alice?.breakdownBySource.PR).toBeCloseTo(500, 6);
    expect(alice?.breakdownBySource.ISSUE).toBeCloseTo(600, 6);
    expect(alice?.aggregateScore).toBeCloseTo(1100, 6);
    expect(alice?.contributingItems).toEqual([
      { itemId: "github-pr:1", title: "Title github-pr:1", url: "https://example.test/github-pr:1", matchPercentage: 100, sourceKind: "PR" },
      { itemId: "jira-issue:1", title: "Title jira-issue:1", url: "https://example.test/jira-issue:1", matchPercentage: 60, sourceKind: "ISSUE" },
      { itemId: "github-pr:2", title: "Title github-pr:2", url: "https://example.test/github-pr:2", matchPercentage: 0, sourceKind: "PR" },
    ]);

    expect(bob?.aggregateScore).toBeCloseTo(800, 6);
    expect(bob?.contributingItems.map((i) => i.matchPercentage)).toEqual([80]);

    expect(carol).toEqual({
      developerId: "carol",
      displayName: "CAROL",
      aggregateScore: 0,
      contributingItems: [],
      breakdownBySource: { PR: 0, ISSUE: 0 },
    });
    expect(dave?.aggregateScore).toBe(0);
    expect(dave?.contributingItems).toEqual([]);
  });

  test("truncates to topN only after ranking everyone", async () => {
    const { logger } = createMockLogger();
    const service = createScoreService({
      store: await seededStore(),
      embeddingProvider: createFakeProvider([1, 0, 0]),
      directory: createInMemoryDeveloperDirectory(directorySeed),
      logger,
    });

    const results = await service.scoreDevelopers("Add retry", 1);

    expect(results.map((r) => r.developerId)).toEqual(["alice"]);
  });

  test("evidence count and window are configurable", async () => {
    const { logger } = createMockLogger();
    const service = createScoreService({
      store: await seededStore(),
      embeddingProvider: createFakeProvider([1, 0, 0]),
      directory: createInMemoryDeveloperDirectory([developer("alice", { githubLogin: "alice" })]),
      logger,
      prWindow: 1,
      evidenceCount: 1,
    });

    const [alice] = await service.scoreDevelopers("Add retry", 5);

    // only the closest PR is inside a window of 1
    expect(alice?.breakdownBySource.PR).toBeCloseTo(1000, 6);
    expect(alice?.contributingItems.map((i) => i.itemId)).toEqual(["github-pr:1"]);
  });

  test("a developer that fails to score is logged and skipped", async () => {
    const { logger, error } = createMockLogger();
    const inner = await seededStore();
    const store: VectorStore = {
      ...inner,
      querySimilar: async (params) => {
        if (params.filters?.ownerIdentity === "bob") throw new Error("connection reset");
        return inner.querySimilar(params);
      },
    };
    const service = createScoreService({
      store,
      embeddingProvider: createFakeProvider([1, 0, 0]),
      directory: createInMemoryDeveloperDirectory(directorySeed),
      logger,
    });

    const results = await service.scoreDevelopers("Add retry", 10);

    expect(results.map((r) => r.developerId)).toEqual(["alice", "carol", "dave"]);
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0]?.[1]).toBe("Failed to score developer, skipping");
  });

  test("embeds the task once", async () => {
    const { logger } = createMockLogger();
    const provider = createFakeProvider([1, 0, 0]);
    const service = createScoreService({
      store: await seededStore(),
      embeddingProvider: provider,
      directory: createInMemoryDeveloperDirectory(directorySeed),
      logger,
    });

    await service.scoreDevelopers("Add retry", 2);

    expect(provider.embedQuery).toHaveBeenCalledTimes(1);
    expect(provider.embedQuery).toHaveBeenCalledWith("Add retry");
  });

  test("rejects invalid parameters before embedding", async () => {
    const { logger } = createMockLogger();
    const provider = createFakeProvider([1, 0, 0]);
    const service = createScoreService({
      store: await seededStore(),
      embeddingProvider: provider,
      directory: createInMemoryDeveloperDirectory(directorySeed),
      logger,
    });

    for (const topN of [0, 1.5, 101]) {
      await expect(service.scoreDevelopers("Add retry", topN)).rejects.toBeInstanceOf(ValidationError);
    }
    await expect(service.scoreDevelopers("   ", 3)).rejects.toThrow("Task text must not be empty");
    expect(provider.embedQuery).not.toHaveBeenCalled();
  });

  test("an empty directory returns no results", async () => {
    const { logger } = createMockLogger();
    const service = createScoreService({
      store: await seededStore(),
      embeddingProvider: createFakeProvider([1, 0, 0]),
      directory: createInMemoryDeveloperDirectory(),
      logger,
    });

    expect(await service.scoreDevelopers("Add retry", 3)).toEqual([]);
  });
});
