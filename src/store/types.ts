import type { SourceKind } from "../context/types.ts";

/** What callers hand to the store: one embedded context record. */
export type EmbeddingInput = {
  entityId: string;
  sourceKind: SourceKind;
  ownerIdentity: string | null;
  scope: string;
  title: string;
  url: string;
  vector: number[];
  contextSnapshot: string;
  metadata: Record<string, unknown>;
};

/** A stored embedding. `id` reflects first insertion and never changes on update. */
export type EmbeddingRecord = EmbeddingInput & {
  id: number;
  createdAt: Date;
  updatedAt: Date;
};

/** Equality filters; an omitted field matches everything. */
export type VectorFilters = {
  sourceKind?: SourceKind;
  ownerIdentity?: string;
  scope?: string;
};

export type SimilarRecord = {
  record: EmbeddingRecord;
  /** Cosine distance, 0 (same direction) to 2 (opposite). */
  distance: number;
  /** 1 - distance. */
  similarity: number;
};

export type UpsertResult = {
  record: EmbeddingRecord;
  wasCreated: boolean;
};

export type VectorStore = {
  /** Atomic insert-or-replace keyed by entityId. Throws DataError on a wrong-length vector. */
  upsert(input: EmbeddingInput): Promise<UpsertResult>;

  /** Exact nearest neighbours by ascending cosine distance; ties by insertion order. */
  querySimilar(params: {
    vector: number[];
    limit: number;
    filters?: VectorFilters;
  }): Promise<SimilarRecord[]>;

  get(entityId: string): Promise<EmbeddingRecord | null>;

  /** Returns true when a record was removed. */
  delete(entityId: string): Promise<boolean>;

  count(filters?: VectorFilters): Promise<number>;
};
