export type EmbeddingInputType = "document" | "query";

/**
 * A raw embedding model. Returns one vector per text it managed to embed;
 * a provider may silently drop malformed items, so callers must not assume
 * positional alignment with the input.
 */
export type EmbeddingBackend = {
  readonly name: string;
  embedBatch(texts: string[], inputType: EmbeddingInputType): Promise<number[][]>;
};

/** In-process model capability consumed by the local backend. */
export type LocalEncoder = {
  encode(texts: string[]): Promise<number[][]>;
};

export type EmbeddedItem<T> = {
  item: T;
  vector: number[];
};

export type FailedItem<T> = {
  item: T;
  error: unknown;
};

export type EmbedWithFallbackResult<T> = {
  embedded: EmbeddedItem<T>[];
  failed: FailedItem<T>[];
  /** True when the single batch call was abandoned for per-item calls. */
  usedFallback: boolean;
};

export type EmbeddingProvider = {
  readonly backendName: string;
  readonly dimensions: number;
  /** Clean, embed in one backend call, and normalize every vector to `dimensions`. */
  embed(texts: string[], inputType?: EmbeddingInputType): Promise<number[][]>;
  /** Embed a single query text. Throws ProviderError when nothing comes back. */
  embedQuery(text: string): Promise<number[]>;
  /** Batch embed with serial per-item retry; items that still fail are dropped. */
  embedWithFallback<T>(
    items: T[],
    getText: (item: T) => string,
  ): Promise<EmbedWithFallbackResult<T>>;
};
