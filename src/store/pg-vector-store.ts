import type { Logger } from "pino";
import type { Sql } from "../db/client.ts";
import type { SourceKind } from "../context/types.ts";
import { DataError } from "../lib/errors.ts";
import { parseVectorLiteral, toVectorLiteral } from "./vector-math.ts";
import type {
  EmbeddingInput,
  EmbeddingRecord,
  SimilarRecord,
  UpsertResult,
  VectorFilters,
  VectorStore,
} from "./types.ts";

type EmbeddingRow = {
  id: number | string;
  entity_id: string;
  source_kind: SourceKind;
  owner_identity: string | null;
  scope: string;
  title: string;
  url: string;
  embedding: unknown;
  context_snapshot: string;
  metadata: Record<string, unknown> | string | null;
  created_at: string | Date;
  updated_at: string | Date;
};

function rowToRecord(row: EmbeddingRow): EmbeddingRecord {
  const metadata: Record<string, unknown> =
    typeof row.metadata === "string" ? JSON.parse(row.metadata) : (row.metadata ?? {});

  return {
    id: Number(row.id),
    entityId: row.entity_id,
    sourceKind: row.source_kind,
    ownerIdentity: row.owner_identity,
    scope: row.scope,
    title: row.title,
    url: row.url,
    vector: parseVectorLiteral(row.embedding),
    contextSnapshot: row.context_snapshot,
    metadata,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function assertDimension(vector: readonly number[], dimensions: number, entityId?: string): void {
  if (vector.length !== dimensions) {
    throw new DataError(
      `Embedding has ${vector.length} dimensions, expected ${dimensions}`,
      entityId,
    );
  }
}

/**
 * Vector store backed by the `context_embeddings` table (pgvector).
 * Similarity is exact cosine distance (`<=>`); no approximate index settings.
 */
export function createPgVectorStore(opts: {
  sql: Sql;
  dimensions: number;
  logger: Logger;
}): VectorStore {
  const { sql, dimensions, logger } = opts;

  const store: VectorStore = {
    async upsert(input: EmbeddingInput): Promise<UpsertResult> {
      assertDimension(input.vector, dimensions, input.entityId);

      const rows = await sql`
        INSERT INTO context_embeddings (
          entity_id, source_kind, owner_identity, scope, title, url,
          embedding, context_snapshot, metadata
        ) VALUES (
          ${input.entityId}, ${input.sourceKind}, ${input.ownerIdentity}, ${input.scope},
          ${input.title}, ${input.url},
          ${toVectorLiteral(input.vector)}::vector, ${input.contextSnapshot},
          ${JSON.stringify(input.metadata)}::jsonb
        )
        ON CONFLICT (entity_id) DO UPDATE SET
          source_kind = EXCLUDED.source_kind,
          owner_identity = EXCLUDED.owner_identity,
          scope = EXCLUDED.scope,
          title = EXCLUDED.title,
          url = EXCLUDED.url,
          embedding = EXCLUDED.embedding,
          context_snapshot = EXCLUDED.context_snapshot,
          metadata = EXCLUDED.metadata,
          updated_at = now()
        RETURNING *, (xmax = 0) AS inserted
      `;

      const row = rows[0];
      if (!row) {
        throw new DataError(`Upsert returned no row for ${input.entityId}`, input.entityId);
      }

      const wasCreated = Boolean(row.inserted);
      logger.debug({ entityId: input.entityId, wasCreated }, "Embedding upserted");
      return { record: rowToRecord(row as unknown as EmbeddingRow), wasCreated };
    },

    async querySimilar(params: {
      vector: number[];
      limit: number;
      filters?: VectorFilters;
    }): Promise<SimilarRecord[]> {
      assertDimension(params.vector, dimensions);
      if (params.limit <= 0) return [];

      const query = toVectorLiteral(params.vector);
      const sourceKind = params.filters?.sourceKind ?? null;
      const ownerIdentity = params.filters?.ownerIdentity ?? null;
      const scope = params.filters?.scope ?? null;

      const rows = await sql`
        SELECT *,
          embedding <=> ${query}::vector AS distance
        FROM context_embeddings
        WHERE (${sourceKind}::text IS NULL OR source_kind = ${sourceKind})
          AND (${ownerIdentity}::text IS NULL OR owner_identity = ${ownerIdentity})
          AND (${scope}::text IS NULL OR scope = ${scope})
        ORDER BY embedding <=> ${query}::vector, id ASC
        LIMIT ${params.limit}
      `;

      return rows.map((row) => {
        // <=> yields NaN against a zero vector; treat that as orthogonal
        const raw = Number(row.distance);
        const distance = Number.isFinite(raw) ? raw : 1;
        return {
          record: rowToRecord(row as unknown as EmbeddingRow),
          distance,
          similarity: 1 - distance,
        };
      });
    },

    async get(entityId: string): Promise<EmbeddingRecord | null> {
      const rows = await sql`
        SELECT * FROM context_embeddings WHERE entity_id = ${entityId}
      `;
      if (rows.length === 0) return null;
      return rowToRecord(rows[0] as unknown as EmbeddingRow);
    },

    async delete(entityId: string): Promise<boolean> {
      const rows = await sql`
        DELETE FROM context_embeddings WHERE entity_id = ${entityId} RETURNING id
      `;
      return rows.length > 0;
    },

    async count(filters?: VectorFilters): Promise<number> {
      const sourceKind = filters?.sourceKind ?? null;
      const ownerIdentity = filters?.ownerIdentity ?? null;
      const scope = filters?.scope ?? null;

      const rows = await sql`
        SELECT COUNT(*)::int AS total
        FROM context_embeddings
        WHERE (${sourceKind}::text IS NULL OR source_kind = ${sourceKind})
          AND (${ownerIdentity}::text IS NULL OR owner_identity = ${ownerIdentity})
          AND (${scope}::text IS NULL OR scope = ${scope})
      `;
      return Number(rows[0]?.total ?? 0);
    },
  };

  logger.debug({ dimensions }, "PgVectorStore initialized");
  return store;
}
