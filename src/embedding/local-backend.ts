import type { Logger } from "pino";
import { ProviderError } from "../lib/errors.ts";
import type { EmbeddingBackend, LocalEncoder } from "./types.ts";

/**
 * In-process embedding backend around a pretrained model's encode call.
 * The encoder is an opaque capability; query and document inputs share it.
 */
export function createLocalBackend(opts: {
  encoder: LocalEncoder;
  name?: string;
  logger: Logger;
}): EmbeddingBackend {
  const { encoder, logger } = opts;
  const name = opts.name ?? "local";

  return {
    name,

    async embedBatch(texts: string[]): Promise<number[][]> {
      if (texts.length === 0) return [];

      try {
        const embeddings = await encoder.encode(texts);
        logger.info({ count: embeddings.length }, "Generated embeddings locally");
        return embeddings;
      } catch (err: unknown) {
        logger.error({ err }, "Local embedding generation failed");
        throw new ProviderError(
          `Local embedding failed: ${err instanceof Error ? err.message : String(err)}`,
          { provider: name, cause: err },
        );
      }
    },
  };
}
