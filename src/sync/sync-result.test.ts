import { describe, test, expect } from "vitest";
import { createSyncTally, syncStatus } from "./sync-result.ts";

describe("syncStatus", () => {
  test("completed without errors, failed when nothing synced", () => {
    expect(syncStatus(0, 0)).toBe("completed");
    expect(syncStatus(0, 5)).toBe("completed");
    expect(syncStatus(2, 5)).toBe("completed_with_errors");
    expect(syncStatus(1, 0)).toBe("failed");
  });
});

describe("createSyncTally", () => {
  test("counts upserts, embeddings and duration", () => {
    const times = [1_000, 3_456];
    const tally = createSyncTally(["OPS"], () => times.shift() ?? 0);

    tally.recordUpsert(true);
    tally.recordUpsert(false);
    tally.recordUpsert(true);
    tally.recordEmbedding();
    tally.recordError("Error processing issue OPS-9: bad");

    expect(tally.finish()).toEqual({
      status: "completed_with_errors",
      scope: ["OPS"],
      itemsSynced: 3,
      created: 2,
      updated: 1,
      embeddingsGenerated: 1,
      errors: ["Error processing issue OPS-9: bad"],
      durationSeconds: 2.46,
    });
  });
});
