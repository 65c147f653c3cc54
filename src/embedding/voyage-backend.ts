import { VoyageAIClient, VoyageAIError, VoyageAITimeoutError } from "voyageai";
import type { Logger } from "pino";
import { ProviderError } from "../lib/errors.ts";
import type { EmbeddingBackend, EmbeddingInputType } from "./types.ts";

const PROVIDER = "voyage";

/** The slice of the Voyage client this backend calls. */
export type VoyageEmbedClient = Pick<VoyageAIClient, "embed">;

function stringifyBody(body: unknown): string | undefined {
  if (body === undefined || body === null) return undefined;
  if (typeof body === "string") return body;
  try {
    return JSON.stringify(body);
  } catch {
    return String(body);
  }
}

/**
 * Networked embedding backend over the Voyage AI API.
 * One HTTP request per batch; retries are left to the provider's
 * per-item fallback, so the SDK's own retries are disabled.
 */
export function createVoyageBackend(opts: {
  apiKey: string;
  model: string;
  timeoutSeconds: number;
  logger: Logger;
  client?: VoyageEmbedClient;
}): EmbeddingBackend {
  const { model, timeoutSeconds, logger } = opts;
  const client: VoyageEmbedClient =
    opts.client ?? new VoyageAIClient({ apiKey: opts.apiKey });

  return {
    name: `voyage:${model}`,

    async embedBatch(
      texts: string[],
      inputType: EmbeddingInputType,
    ): Promise<number[][]> {
      if (texts.length === 0) return [];

      logger.info({ model, count: texts.length }, "Calling Voyage embeddings API");

      let response: Awaited<ReturnType<VoyageEmbedClient["embed"]>>;
      try {
        response = await client.embed(
          { input: texts, model, inputType },
          { timeoutInSeconds: timeoutSeconds, maxRetries: 0 },
        );
      } catch (err: unknown) {
        if (err instanceof VoyageAIError) {
          const body = stringifyBody(err.body);
          logger.error(
            { status: err.statusCode, body },
            "Voyage embeddings API returned an error",
          );
          throw new ProviderError(`Voyage embeddings request failed: ${err.message}`, {
            provider: PROVIDER,
            status: err.statusCode,
            body,
            cause: err,
          });
        }
        if (err instanceof VoyageAITimeoutError) {
          logger.error({ timeoutSeconds }, "Voyage embeddings API timed out");
          throw new ProviderError("Voyage embeddings request timed out", {
            provider: PROVIDER,
            cause: err,
          });
        }
        throw new ProviderError(
          `Voyage embeddings request failed: ${err instanceof Error ? err.message : String(err)}`,
          { provider: PROVIDER, cause: err },
        );
      }

      if (!Array.isArray(response.data)) {
        throw new ProviderError("Voyage embeddings response missing data", {
          provider: PROVIDER,
          body: stringifyBody(response),
        });
      }

      const embeddings: number[][] = [];
      for (const item of response.data) {
        if (Array.isArray(item.embedding)) {
          embeddings.push(item.embedding);
        }
      }

      if (embeddings.length !== texts.length) {
        logger.warn(
          { requested: texts.length, received: embeddings.length },
          "Voyage returned fewer embeddings than requested",
        );
      }
      logger.info({ count: embeddings.length }, "Generated embeddings via Voyage API");
      return embeddings;
    },
  };
}
