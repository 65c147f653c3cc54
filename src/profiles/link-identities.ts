import type { Logger } from "pino";
import type { IdentityMatch } from "../identity/types.ts";
import { describeError } from "../lib/errors.ts";
import type { DeveloperDirectory } from "./types.ts";

export type LinkIdentitiesResult = {
  linked: number;
  created: number;
  /** One message per match that could not be linked. */
  failures: string[];
};

/**
 * Link each GitHub/Jira pair into the directory under the GitHub login.
 * A failing link (e.g. a Jira account already owned by another profile)
 * is recorded and the remaining matches are still linked.
 */
export async function linkMatchedIdentities(params: {
  directory: DeveloperDirectory;
  matches: readonly IdentityMatch[];
  logger: Logger;
}): Promise<LinkIdentitiesResult> {
  const { directory, matches, logger } = params;
  const result: LinkIdentitiesResult = { linked: 0, created: 0, failures: [] };

  for (const { github, jira } of matches) {
    try {
      const { wasCreated } = await directory.linkIdentity({
        developerId: github.login,
        displayName: github.name ?? jira.displayName ?? undefined,
        email: github.email ?? jira.emailAddress ?? undefined,
        githubLogin: github.login,
        githubId: github.id,
        jiraAccountId: jira.accountId,
      });
      result.linked++;
      if (wasCreated) result.created++;
    } catch (err) {
      logger.warn({ err, login: github.login, jiraAccountId: jira.accountId }, "Failed to link identity");
      result.failures.push(`Error linking ${github.login} to ${jira.accountId}: ${describeError(err)}`);
    }
  }

  logger.info(
    { linked: result.linked, created: result.created, failed: result.failures.length },
    "Identity linking finished",
  );
  return result;
}
