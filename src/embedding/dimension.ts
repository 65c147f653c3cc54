import type { Logger } from "pino";

export const DEFAULT_EMBEDDING_DIMENSION = 1536;

/**
 * Force a vector to exactly `target` components: zero-pad shorter vectors,
 * keep the first `target` components of longer ones.
 */
export function normalizeDimension(
  vector: readonly number[],
  target: number = DEFAULT_EMBEDDING_DIMENSION,
  logger?: Logger,
): number[] {
  if (vector.length === target) return [...vector];

  if (vector.length < target) {
    return [...vector, ...new Array<number>(target - vector.length).fill(0)];
  }

  logger?.warn(
    { size: vector.length, target },
    "Embedding exceeds target dimension, truncating",
  );
  return vector.slice(0, target);
}
