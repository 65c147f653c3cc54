import { DataError } from "../lib/errors.ts";
import { countWordTokens, stripHtmlComments } from "./markup.ts";
import type { ContextRecord, GithubPullRequest } from "./types.ts";

export const MAX_DESCRIPTION_CHARS = 1000;
export const DEFAULT_MAX_COMMITS = 20;

// Commits with this many word tokens or fewer ("wip", "fix typo") are noise.
const MIN_COMMIT_WORDS = 5;

export type PullRequestContextOptions = {
  maxCommits?: number;
};

export function pullRequestEntityId(prId: number): string {
  return `github-pr:${prId}`;
}

/** First lines of the commit messages worth embedding, in PR order. */
export function selectCommitMessages(messages: string[], maxCommits: number): string[] {
  const selected: string[] = [];
  for (const message of messages) {
    if (selected.length >= maxCommits) break;
    if (countWordTokens(message) <= MIN_COMMIT_WORDS) continue;
    const firstLine = message.split(/\r?\n/)[0]?.trim();
    if (firstLine) selected.push(firstLine);
  }
  return selected;
}

/**
 * Build the canonical context text for a pull request:
 *
 *   PR_INTENT: <title>
 *   DESCRIPTION: <body without HTML comments>
 *   LABELS: <a, b>
 *
 *   FILE_CHANGES:
 *   - [MODIFIED] src/app.ts
 *
 *   COMMITS:
 *   - <first line of each non-trivial commit>
 *
 * Diff bodies are never included. Throws DataError for a PR without an author.
 */
export function buildPullRequestContext(
  pr: GithubPullRequest,
  opts: PullRequestContextOptions = {},
): ContextRecord {
  const entityId = pullRequestEntityId(pr.id);
  if (!pr.author) {
    throw new DataError(`PR #${pr.number} in ${pr.repoFullName} has no author`, entityId);
  }

  const description = stripHtmlComments(pr.body ?? "")
    .trim()
    .slice(0, MAX_DESCRIPTION_CHARS);
  const commits = selectCommitMessages(pr.commitMessages, opts.maxCommits ?? DEFAULT_MAX_COMMITS);

  const lines = [
    `PR_INTENT: ${pr.title}`,
    `DESCRIPTION: ${description}`,
    `LABELS: ${pr.labels.join(", ")}`,
    "",
    "FILE_CHANGES:",
    ...pr.files.map((f) => `- [${f.status.toUpperCase()}] ${f.filename}`),
    "",
    "COMMITS:",
    ...commits.map((c) => `- ${c}`),
  ];

  return {
    entityId,
    sourceKind: "PR",
    ownerIdentity: pr.author.login,
    scope: pr.repoFullName,
    title: pr.title,
    url: pr.htmlUrl,
    rawContext: lines.join("\n"),
    metadata: {
      number: pr.number,
      authorId: pr.author.id,
      changedFiles: pr.files.map((f) => f.filename),
      labels: pr.labels,
    },
  };
}
