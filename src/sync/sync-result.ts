import type { SyncResult, SyncStatus } from "./types.ts";

export type SyncTally = {
  readonly errors: string[];
  recordUpsert(wasCreated: boolean): void;
  recordEmbedding(): void;
  recordError(message: string): void;
  finish(): SyncResult;
};

export function syncStatus(errorCount: number, itemsSynced: number): SyncStatus {
  if (errorCount === 0) return "completed";
  return itemsSynced === 0 ? "failed" : "completed_with_errors";
}

/** Accumulates counts and per-item errors during one sync run. */
export function createSyncTally(scope: string[], now: () => number = Date.now): SyncTally {
  const startedAt = now();
  const errors: string[] = [];
  let created = 0;
  let updated = 0;
  let embeddingsGenerated = 0;

  return {
    errors,

    recordUpsert(wasCreated: boolean) {
      if (wasCreated) created++;
      else updated++;
    },

    recordEmbedding() {
      embeddingsGenerated++;
    },

    recordError(message: string) {
      errors.push(message);
    },

    finish(): SyncResult {
      const itemsSynced = created + updated;
      return {
        status: syncStatus(errors.length, itemsSynced),
        scope,
        itemsSynced,
        created,
        updated,
        embeddingsGenerated,
        errors,
        durationSeconds: Math.round((now() - startedAt) / 10) / 100,
      };
    },
  };
}
