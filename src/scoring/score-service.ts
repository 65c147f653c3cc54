import type { Logger } from "pino";
import type { SourceKind } from "../context/types.ts";
import type { EmbeddingProvider } from "../embedding/types.ts";
import { ValidationError } from "../lib/errors.ts";
import type { DeveloperDirectory, DeveloperProfile } from "../profiles/types.ts";
import type { SimilarRecord, VectorStore } from "../store/types.ts";
import type { ContributingItem, ScoreResult, ScoreService } from "./types.ts";

export const DEFAULT_PR_WINDOW = 50;
export const DEFAULT_EVIDENCE_COUNT = 3;
export const MAX_TOP_N = 100;

// Spreads typical cosine similarities of short technical text over a wider range.
const SCORE_SCALE = 1000;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Task text as scored: title, then description on the next line when present. */
export function composeTaskText(title: string, description?: string | null): string {
  const t = title.trim();
  const d = (description ?? "").trim();
  return d ? `${t}\n${d}` : t;
}

export function subscore(matches: readonly SimilarRecord[]): number {
  if (matches.length === 0) return 0;
  const total = matches.reduce((sum, m) => sum + m.similarity, 0);
  return (total / matches.length) * SCORE_SCALE;
}

export function createScoreService(opts: {
  store: VectorStore;
  embeddingProvider: EmbeddingProvider;
  directory: DeveloperDirectory;
  logger: Logger;
  prWindow?: number;
  evidenceCount?: number;
}): ScoreService {
  const { store, embeddingProvider, directory, logger } = opts;
  const prWindow = opts.prWindow ?? DEFAULT_PR_WINDOW;
  const evidenceCount = opts.evidenceCount ?? DEFAULT_EVIDENCE_COUNT;

  async function matchesFor(
    taskVector: number[],
    sourceKind: SourceKind,
    ownerIdentity: string | null,
  ): Promise<SimilarRecord[]> {
    if (!ownerIdentity) return [];
    return store.querySimilar({
      vector: taskVector,
      limit: prWindow,
      filters: { sourceKind, ownerIdentity },
    });
  }

  async function scoreOne(developer: DeveloperProfile, taskVector: number[]): Promise<ScoreResult> {
    const prMatches = await matchesFor(taskVector, "PR", developer.githubLogin);
    const issueMatches = await matchesFor(taskVector, "ISSUE", developer.jiraAccountId);

    const breakdownBySource = {
      PR: subscore(prMatches),
      ISSUE: subscore(issueMatches),
    };

    const contributingItems: ContributingItem[] = [...prMatches, ...issueMatches]
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, evidenceCount)
      .map((m) => ({
        itemId: m.record.entityId,
        title: m.record.title,
        url: m.record.url,
        matchPercentage: round2(m.similarity * 100),
        sourceKind: m.record.sourceKind,
      }));

    return {
      developerId: developer.developerId,
      displayName: developer.displayName,
      aggregateScore: breakdownBySource.PR + breakdownBySource.ISSUE,
      contributingItems,
      breakdownBySource,
    };
  }

  return {
    async scoreDevelopers(taskText: string, topN: number): Promise<ScoreResult[]> {
      if (!Number.isInteger(topN) || topN < 1 || topN > MAX_TOP_N) {
        throw new ValidationError(`topN must be an integer between 1 and ${MAX_TOP_N}, got ${topN}`, "topN");
      }
      if (!taskText.trim()) {
        throw new ValidationError("Task text must not be empty", "taskText");
      }

      const developers = await directory.listDevelopers();
      if (developers.length === 0) return [];

      const taskVector = await embeddingProvider.embedQuery(taskText);

      const results: ScoreResult[] = [];
      for (const developer of developers) {
        try {
          results.push(await scoreOne(developer, taskVector));
        } catch (err) {
          logger.error(
            { err, developerId: developer.developerId },
            "Failed to score developer, skipping",
          );
        }
      }

      // Array.prototype.sort is stable: equal scores keep directory order
      results.sort((a, b) => b.aggregateScore - a.aggregateScore);

      logger.info(
        { developers: developers.length, scored: results.length, topN },
        "Developers ranked",
      );
      return results.slice(0, topN);
    },
  };
}
