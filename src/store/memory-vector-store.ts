import { cosineDistance } from "./vector-math.ts";
import { assertDimension } from "./pg-vector-store.ts";
import type {
  EmbeddingInput,
  EmbeddingRecord,
  SimilarRecord,
  UpsertResult,
  VectorFilters,
  VectorStore,
} from "./types.ts";

function matches(record: EmbeddingRecord, filters: VectorFilters | undefined): boolean {
  if (!filters) return true;
  if (filters.sourceKind !== undefined && record.sourceKind !== filters.sourceKind) return false;
  if (filters.ownerIdentity !== undefined && record.ownerIdentity !== filters.ownerIdentity) {
    return false;
  }
  if (filters.scope !== undefined && record.scope !== filters.scope) return false;
  return true;
}

/**
 * In-process VectorStore with the same ordering rules as the Postgres one.
 * Used by tests and by local runs without DATABASE_URL.
 */
export function createInMemoryVectorStore(opts: {
  dimensions: number;
  now?: () => Date;
}): VectorStore {
  const { dimensions } = opts;
  const now = opts.now ?? (() => new Date());
  const records = new Map<string, EmbeddingRecord>();
  let nextId = 1;

  return {
    async upsert(input: EmbeddingInput): Promise<UpsertResult> {
      assertDimension(input.vector, dimensions, input.entityId);

      const existing = records.get(input.entityId);
      const timestamp = now();
      const record: EmbeddingRecord = {
        ...input,
        vector: [...input.vector],
        metadata: { ...input.metadata },
        id: existing?.id ?? nextId++,
        createdAt: existing?.createdAt ?? timestamp,
        updatedAt: timestamp,
      };
      records.set(input.entityId, record);
      return { record, wasCreated: existing === undefined };
    },

    async querySimilar(params): Promise<SimilarRecord[]> {
      assertDimension(params.vector, dimensions);
      if (params.limit <= 0) return [];

      const scored: SimilarRecord[] = [];
      for (const record of records.values()) {
        if (!matches(record, params.filters)) continue;
        const distance = cosineDistance(params.vector, record.vector);
        scored.push({ record, distance, similarity: 1 - distance });
      }

      scored.sort((a, b) => a.distance - b.distance || a.record.id - b.record.id);
      return scored.slice(0, params.limit);
    },

    async get(entityId: string): Promise<EmbeddingRecord | null> {
      return records.get(entityId) ?? null;
    },

    async delete(entityId: string): Promise<boolean> {
      return records.delete(entityId);
    },

    async count(filters?: VectorFilters): Promise<number> {
      let total = 0;
      for (const record of records.values()) {
        if (matches(record, filters)) total++;
      }
      return total;
    },
  };
}
