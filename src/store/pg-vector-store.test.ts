import { describe, test, expect } from "vitest";
import type { Logger } from "pino";
import type { Sql } from "../db/client.ts";
import { createPgVectorStore } from "./pg-vector-store.ts";
import type { EmbeddingInput } from "./types.ts";
import { DataError } from "../lib/errors.ts";

function createMockLogger(): Logger {
  return {
    warn: () => {},
    info: () => {},
    debug: () => {},
    error: () => {},
    child: () => createMockLogger(),
  } as unknown as Logger;
}

interface SqlCall {
  strings: string[];
  values: unknown[];
}

function createMockSql(respond: (text: string) => Array<Record<string, unknown>>): Sql & {
  calls: SqlCall[];
} {
  const calls: SqlCall[] = [];

  const fn = (strings: TemplateStringsArray, ...values: unknown[]) => {
    calls.push({ strings: Array.from(strings), values });
    return Promise.resolve(respond(strings.join("?")));
  };

  return new Proxy(fn, {
    apply: (_target, _thisArg, args) => fn(args[0], ...args.slice(1)),
    get: (_target, prop) => {
      if (prop === "calls") return calls;
      return undefined;
    },
  }) as unknown as Sql & { calls: SqlCall[] };
}

function makeRow(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 7,
    entity_id: "github-pr:1",
    source_kind: "PR",
    owner_identity: "alice",
    scope: "acme/api",
    title: "Add retries",
    url: "https://github.com/acme/api/pull/1",
    embedding: "[1,0,0]",
    context_snapshot: "PR_INTENT: Add retries",
    metadata: { number: 1 },
    created_at: "2025-01-01T00:00:00.000Z",
    updated_at: "2025-01-02T00:00:00.000Z",
    ...overrides,
  };
}

const input: EmbeddingInput = {
  entityId: "github-pr:1",
  sourceKind: "PR",
  ownerIdentity: "alice",
  scope: "acme/api",
  title: "Add retries",
  url: "https://github.com/acme/api/pull/1",
  vector: [1, 0, 0],
  contextSnapshot: "PR_INTENT: Add retries",
  metadata: { number: 1 },
};

describe("createPgVectorStore", () => {
  test("upsert sends the vector literal and reads the inserted flag", async () => {
    const sql = createMockSql(() => [makeRow({ inserted: true })]);
    const store = createPgVectorStore({ sql, dimensions: 3, logger: createMockLogger() });

    const result = await store.upsert(input);

    expect(result.wasCreated).toBe(true);
    expect(result.record.id).toBe(7);
    expect(result.record.vector).toEqual([1, 0, 0]);
    expect(result.record.metadata).toEqual({ number: 1 });
    expect(result.record.updatedAt.toISOString()).toBe("2025-01-02T00:00:00.000Z");

    const call = sql.calls[0];
    expect(call?.strings.join("?")).toContain("ON CONFLICT (entity_id) DO UPDATE");
    expect(call?.strings.join("?")).toContain("(xmax = 0) AS inserted");
    expect(call?.values).toContain("[1,0,0]");
    expect(call?.values).toContain('{"number":1}');
  });

  test("upsert of an existing row reports an update", async () => {
    const sql = createMockSql(() => [makeRow({ inserted: false, metadata: '{"number":1}' })]);
    const store = createPgVectorStore({ sql, dimensions: 3, logger: createMockLogger() });

    const result = await store.upsert(input);

    expect(result.wasCreated).toBe(false);
    expect(result.record.metadata).toEqual({ number: 1 });
  });

  test("rejects a wrong-length vector before touching the database", async () => {
    const sql = createMockSql(() => []);
    const store = createPgVectorStore({ sql, dimensions: 4, logger: createMockLogger() });

    await expect(store.upsert(input)).rejects.toBeInstanceOf(DataError);
    expect(sql.calls).toHaveLength(0);
  });

  test("querySimilar orders by cosine distance then id and maps similarity", async () => {
    const sql = createMockSql(() => [
      makeRow({ distance: 0.25 }),
      makeRow({ id: 8, entity_id: "github-pr:2", distance: "0.5" }),
    ]);
    const store = createPgVectorStore({ sql, dimensions: 3, logger: createMockLogger() });

    const results = await store.querySimilar({
      vector: [1, 0, 0],
      limit: 50,
      filters: { sourceKind: "PR", ownerIdentity: "alice" },
    });

    expect(results.map((r) => r.record.entityId)).toEqual(["github-pr:1", "github-pr:2"]);
    expect(results[0]?.similarity).toBe(0.75);
    expect(results[1]?.distance).toBe(0.5);
    expect(results[1]?.similarity).toBe(0.5);

    const call = sql.calls[0];
    expect(call?.strings.join("?")).toContain("ORDER BY embedding <=> ?::vector, id ASC");
    expect(call?.values).toEqual(["[1,0,0]", "PR", "PR", "alice", "alice", null, null, "[1,0,0]", 50]);
  });

  test("count and delete", async () => {
    const sql = createMockSql((text) => {
      if (text.includes("COUNT(*)")) return [{ total: 3 }];
      if (text.includes("DELETE")) return [{ id: 7 }];
      return [];
    });
    const store = createPgVectorStore({ sql, dimensions: 3, logger: createMockLogger() });

    expect(await store.count({ scope: "acme/api" })).toBe(3);
    expect(await store.delete("github-pr:1")).toBe(true);
    expect(await store.get("github-pr:1")).toBeNull();
  });
});
