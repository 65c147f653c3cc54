import type { SourceKind } from "../context/types.ts";

export type ContributingItem = {
  itemId: string;
  title: string;
  url: string;
  /** Similarity as a percentage, two decimals. */
  matchPercentage: number;
  sourceKind: SourceKind;
};

export type ScoreResult = {
  developerId: string;
  displayName: string;
  /**
   * Sum of the per-source subscores. Each subscore is mean cosine
   * similarity × 1000: a relative ranking value, not a probability.
   */
  aggregateScore: number;
  contributingItems: ContributingItem[];
  breakdownBySource: Record<SourceKind, number>;
};

export type ScoreService = {
  scoreDevelopers(taskText: string, topN: number): Promise<ScoreResult[]>;
};
