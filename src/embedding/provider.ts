import type { Logger } from "pino";
import type { AppConfig } from "../config.ts";
import { ConfigurationError, ProviderError } from "../lib/errors.ts";
import { err, ok, type Result } from "../lib/result.ts";
import { cleanText } from "../lib/text-normalizer.ts";
import { normalizeDimension } from "./dimension.ts";
import { createLocalBackend } from "./local-backend.ts";
import { createVoyageBackend, type VoyageEmbedClient } from "./voyage-backend.ts";
import type {
  EmbeddingBackend,
  EmbeddingInputType,
  EmbeddingProvider,
  EmbedWithFallbackResult,
  LocalEncoder,
} from "./types.ts";

/**
 * Select the embedding backend once from configuration.
 * The choice is static for the lifetime of the provider.
 */
export function createEmbeddingBackend(
  config: AppConfig["embedding"],
  deps: { logger: Logger; localEncoder?: LocalEncoder; voyageClient?: VoyageEmbedClient },
): Result<EmbeddingBackend, ConfigurationError> {
  if (config.backend === "local") {
    if (!deps.localEncoder) {
      return err(
        new ConfigurationError(
          "EMBEDDING_BACKEND=local requires an in-process encoder",
          "embeddingBackend",
        ),
      );
    }
    return ok(createLocalBackend({ encoder: deps.localEncoder, logger: deps.logger }));
  }

  if (!config.apiKey) {
    return err(new ConfigurationError("VOYAGE_API_KEY is not set", "voyageApiKey"));
  }
  return ok(
    createVoyageBackend({
      apiKey: config.apiKey,
      model: config.model,
      timeoutSeconds: config.timeoutSeconds,
      logger: deps.logger,
      client: deps.voyageClient,
    }),
  );
}

/**
 * Wrap a backend with text cleaning, dimension normalization and the
 * batch-then-per-item failure policy. No caching: every call hits the backend.
 */
export function createEmbeddingProvider(opts: {
  backend: EmbeddingBackend;
  dimensions: number;
  logger: Logger;
}): EmbeddingProvider {
  const { backend, dimensions, logger } = opts;

  async function embed(
    texts: string[],
    inputType: EmbeddingInputType = "document",
  ): Promise<number[][]> {
    if (texts.length === 0) return [];
    const cleaned = texts.map((t) => cleanText(t));
    const raw = await backend.embedBatch(cleaned, inputType);
    return raw.map((vector) => normalizeDimension(vector, dimensions, logger));
  }

  async function embedOne(text: string, inputType: EmbeddingInputType): Promise<number[]> {
    const [vector] = await embed([text], inputType);
    if (!vector) {
      throw new ProviderError("Embedding backend returned no vector", {
        provider: backend.name,
      });
    }
    return vector;
  }

  return {
    get backendName() {
      return backend.name;
    },
    get dimensions() {
      return dimensions;
    },

    embed,

    async embedQuery(text: string): Promise<number[]> {
      return embedOne(text, "query");
    },

    async embedWithFallback<T>(
      items: T[],
      getText: (item: T) => string,
    ): Promise<EmbedWithFallbackResult<T>> {
      const result: EmbedWithFallbackResult<T> = {
        embedded: [],
        failed: [],
        usedFallback: false,
      };
      if (items.length === 0) return result;

      const texts = items.map(getText);

      try {
        const vectors = await embed(texts);
        if (vectors.length === items.length) {
          result.embedded = items.map((item, i) => ({ item, vector: vectors[i] ?? [] }));
          return result;
        }
        // A short batch cannot be mapped back to its inputs by position
        logger.warn(
          { requested: items.length, received: vectors.length },
          "Batch embedding count mismatch, re-embedding items individually",
        );
      } catch (error: unknown) {
        logger.warn(
          { err: error, count: items.length },
          "Batch embedding failed, processing items individually",
        );
      }

      result.usedFallback = true;
      for (const [i, item] of items.entries()) {
        const text = texts[i] ?? "";
        try {
          result.embedded.push({ item, vector: await embedOne(text, "document") });
        } catch (error: unknown) {
          logger.error(
            { err: error, preview: text.slice(0, 200) },
            "Failed to embed item, skipping",
          );
          result.failed.push({ item, error });
        }
      }

      return result;
    },
  };
}
