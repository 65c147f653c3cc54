import type { Logger } from "pino";
import type { ContextRecord } from "../context/types.ts";
import type { EmbeddingProvider } from "../embedding/types.ts";
import { describeError } from "../lib/errors.ts";
import type { EmbeddingInput, UpsertResult, VectorStore } from "../store/types.ts";

export function toEmbeddingInput(context: ContextRecord, vector: number[]): EmbeddingInput {
  return {
    entityId: context.entityId,
    sourceKind: context.sourceKind,
    ownerIdentity: context.ownerIdentity,
    scope: context.scope,
    title: context.title,
    url: context.url,
    vector,
    contextSnapshot: context.rawContext,
    metadata: context.metadata,
  };
}

/**
 * Embed context records (batch, then per item on failure) and upsert the
 * vectors. Items that cannot be embedded or stored are reported in `errors`.
 */
export async function storeContextEmbeddings(params: {
  contexts: ContextRecord[];
  provider: EmbeddingProvider;
  store: VectorStore;
  logger: Logger;
}): Promise<{ stored: UpsertResult[]; errors: string[] }> {
  const { contexts, provider, store, logger } = params;
  const stored: UpsertResult[] = [];
  const errors: string[] = [];
  if (contexts.length === 0) return { stored, errors };

  const { embedded, failed } = await provider.embedWithFallback(contexts, (c) => c.rawContext);

  for (const { item, error } of failed) {
    errors.push(`Error embedding ${item.entityId}: ${describeError(error)}`);
  }

  for (const { item, vector } of embedded) {
    try {
      stored.push(await store.upsert(toEmbeddingInput(item, vector)));
    } catch (err) {
      logger.error({ err, entityId: item.entityId }, "Failed to store embedding");
      errors.push(`Error storing embedding ${item.entityId}: ${describeError(err)}`);
    }
  }

  return { stored, errors };
}
