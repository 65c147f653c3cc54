import type { Logger } from "pino";
import { buildPullRequestContext } from "../context/github-context.ts";
import type { ContextRecord, GithubUserRef } from "../context/types.ts";
import type { EmbeddingProvider } from "../embedding/types.ts";
import { describeError } from "../lib/errors.ts";
import type { VectorStore } from "../store/types.ts";
import { createSyncTally } from "./sync-result.ts";
import { storeContextEmbeddings } from "./store-contexts.ts";
import type { PullRequestListing, PullRequestSource, SyncResult } from "./types.ts";

export const DEFAULT_MAX_PRS_PER_AUTHOR = 100;

/**
 * Pull closed PRs per author, build their contexts, embed and upsert them.
 * Authors default to every organization member. Failures for one author,
 * repository or PR are recorded and the run continues.
 */
export async function syncGithubPullRequests(opts: {
  source: PullRequestSource;
  provider: EmbeddingProvider;
  store: VectorStore;
  logger: Logger;
  authors?: GithubUserRef[];
  maxPrsPerAuthor?: number;
  maxCommits?: number;
  now?: () => number;
}): Promise<SyncResult> {
  const { source, provider, store, logger } = opts;
  const maxPrs = opts.maxPrsPerAuthor ?? DEFAULT_MAX_PRS_PER_AUTHOR;

  const authors = opts.authors ?? (await source.listOrgMembers());
  const tally = createSyncTally(
    authors.map((a) => a.login),
    opts.now,
  );

  const contexts: ContextRecord[] = [];
  for (const author of authors) {
    let listing: PullRequestListing;
    try {
      listing = await source.listClosedPullRequests(author, maxPrs);
    } catch (err) {
      logger.warn({ err, author: author.login }, "Failed to fetch pull requests, skipping author");
      tally.recordError(`Error fetching pull requests for ${author.login}: ${describeError(err)}`);
      continue;
    }

    const { pullRequests } = listing;
    for (const message of listing.errors) tally.recordError(message);

    for (const pr of pullRequests) {
      try {
        contexts.push(buildPullRequestContext(pr, { maxCommits: opts.maxCommits }));
      } catch (err) {
        logger.warn({ err, repo: pr.repoFullName, number: pr.number }, "Skipping pull request");
        tally.recordError(
          `Error processing pull request ${pr.repoFullName}#${pr.number}: ${describeError(err)}`,
        );
      }
    }

    logger.info({ author: author.login, pullRequests: pullRequests.length }, "Fetched pull requests");
  }

  const { stored, errors } = await storeContextEmbeddings({ contexts, provider, store, logger });
  for (const { wasCreated } of stored) {
    tally.recordUpsert(wasCreated);
    tally.recordEmbedding();
  }
  for (const message of errors) tally.recordError(message);

  const result = tally.finish();
  logger.info(
    {
      status: result.status,
      authors: result.scope.length,
      itemsSynced: result.itemsSynced,
      errors: result.errors.length,
    },
    "GitHub sync finished",
  );
  return result;
}
