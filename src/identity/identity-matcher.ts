/**
 * Suggests GitHub <-> Jira account links.
 * An exact email match is decisive; otherwise names and logins are compared
 * with fuzzy string scores.
 */

import { ValidationError } from "../lib/errors.ts";
import { partialRatio, tokenSetRatio } from "./fuzzy.ts";
import type { GithubIdentity, IdentityMatch, JiraIdentity } from "./types.ts";

export const DEFAULT_MATCH_THRESHOLD = 75;

const NAME_WEIGHT = 0.5;
const LOGIN_WEIGHT = 0.5;
const SHORT_LOGIN_WEIGHT = 0.2;
const SHORT_LOGIN_MAX_LENGTH = 2;

function clean(value: string | null | undefined): string {
  return (value ?? "").toLowerCase().trim();
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function isEmailMatch(github: GithubIdentity, jira: JiraIdentity): boolean {
  const ghEmail = clean(github.email);
  return ghEmail !== "" && ghEmail === clean(jira.emailAddress);
}

/**
 * Fuzzy score of one Jira user against a GitHub user, before rounding.
 * Returns 100 for an email match.
 */
export function scoreCandidate(github: GithubIdentity, jira: JiraIdentity): number {
  if (isEmailMatch(github, jira)) return 100;

  const ghName = clean(github.name);
  const ghLogin = clean(github.login);
  const jrName = clean(jira.displayName);

  let score = 0;
  if (ghName && jrName) {
    score += tokenSetRatio(ghName, jrName) * NAME_WEIGHT;
  }
  if (ghLogin && jrName) {
    const weight = ghLogin.length > SHORT_LOGIN_MAX_LENGTH ? LOGIN_WEIGHT : SHORT_LOGIN_WEIGHT;
    score += partialRatio(ghLogin, jrName) * weight;
  }
  return score;
}

/**
 * Best Jira candidate for one GitHub user. Scans in input order; an email
 * match stops the scan and the first of equal scores wins.
 */
export function findBestMatch(
  github: GithubIdentity,
  jiraUsers: readonly JiraIdentity[],
): { jira: JiraIdentity | null; score: number } {
  let best: JiraIdentity | null = null;
  let highest = 0;

  for (const jira of jiraUsers) {
    if (isEmailMatch(github, jira)) return { jira, score: 100 };
    const score = scoreCandidate(github, jira);
    if (score > highest) {
      highest = score;
      best = jira;
    }
  }

  return { jira: best, score: round2(highest) };
}

/**
 * Pair each GitHub user with its best Jira candidate, keeping pairs that
 * reach `threshold`. Output follows the GitHub input order.
 */
export function matchIdentities(params: {
  githubUsers: readonly GithubIdentity[];
  jiraUsers: readonly JiraIdentity[];
  threshold?: number;
}): IdentityMatch[] {
  const threshold = params.threshold ?? DEFAULT_MATCH_THRESHOLD;
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 100) {
    throw new ValidationError(
      `threshold must be between 0 and 100 inclusive, got ${threshold}`,
      "threshold",
    );
  }

  const matches: IdentityMatch[] = [];
  for (const github of params.githubUsers) {
    const { jira, score } = findBestMatch(github, params.jiraUsers);
    if (jira && score >= threshold) {
      matches.push({ github, jira, score });
    }
  }
  return matches;
}
