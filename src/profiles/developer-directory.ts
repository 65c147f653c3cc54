import type { Logger } from "pino";
import type { Sql } from "../db/client.ts";
import type { DeveloperDirectory, DeveloperProfile, LinkIdentityParams } from "./types.ts";

type DeveloperRow = {
  developer_id: string;
  display_name: string;
  email: string | null;
  github_login: string | null;
  github_id: number | string | null;
  jira_account_id: string | null;
};

function rowToProfile(row: DeveloperRow): DeveloperProfile {
  return {
    developerId: row.developer_id,
    displayName: row.display_name,
    email: row.email,
    githubLogin: row.github_login,
    githubId: row.github_id === null ? null : Number(row.github_id),
    jiraAccountId: row.jira_account_id,
  };
}

/**
 * Developer directory backed by `developer_profiles`.
 * Listing order is creation order.
 */
export function createPgDeveloperDirectory(opts: {
  sql: Sql;
  logger: Logger;
}): DeveloperDirectory {
  const { sql, logger } = opts;

  return {
    async listDevelopers(): Promise<DeveloperProfile[]> {
      const rows = await sql`
        SELECT * FROM developer_profiles ORDER BY id ASC
      `;
      return rows.map((row) => rowToProfile(row as unknown as DeveloperRow));
    },

    async getDeveloper(developerId: string): Promise<DeveloperProfile | null> {
      const rows = await sql`
        SELECT * FROM developer_profiles WHERE developer_id = ${developerId}
      `;
      if (rows.length === 0) return null;
      return rowToProfile(rows[0] as unknown as DeveloperRow);
    },

    async linkIdentity(params: LinkIdentityParams) {
      const displayName = params.displayName ?? null;
      const email = params.email ?? null;
      const githubLogin = params.githubLogin ?? null;
      const githubId = params.githubId ?? null;
      const jiraAccountId = params.jiraAccountId ?? null;

      const rows = await sql`
        INSERT INTO developer_profiles (
          developer_id, display_name, email, github_login, github_id, jira_account_id
        ) VALUES (
          ${params.developerId}, ${displayName ?? params.developerId}, ${email},
          ${githubLogin}, ${githubId}, ${jiraAccountId}
        )
        ON CONFLICT (developer_id) DO UPDATE SET
          display_name = COALESCE(${displayName}, developer_profiles.display_name),
          email = COALESCE(EXCLUDED.email, developer_profiles.email),
          github_login = COALESCE(EXCLUDED.github_login, developer_profiles.github_login),
          github_id = COALESCE(EXCLUDED.github_id, developer_profiles.github_id),
          jira_account_id = COALESCE(EXCLUDED.jira_account_id, developer_profiles.jira_account_id),
          updated_at = now()
        RETURNING *, (xmax = 0) AS inserted
      `;

      const row = rows[0];
      if (!row) {
        throw new Error(`linkIdentity returned no row for ${params.developerId}`);
      }

      const wasCreated = Boolean(row.inserted);
      logger.info(
        { developerId: params.developerId, githubLogin, jiraAccountId, wasCreated },
        "Developer identity linked",
      );
      return { profile: rowToProfile(row as unknown as DeveloperRow), wasCreated };
    },
  };
}

/** In-process directory seeded with fixed profiles. */
export function createInMemoryDeveloperDirectory(
  seed: readonly DeveloperProfile[] = [],
): DeveloperDirectory {
  const profiles = new Map<string, DeveloperProfile>();
  for (const profile of seed) profiles.set(profile.developerId, { ...profile });

  return {
    async listDevelopers() {
      return [...profiles.values()];
    },

    async getDeveloper(developerId: string) {
      return profiles.get(developerId) ?? null;
    },

    async linkIdentity(params: LinkIdentityParams) {
      const existing = profiles.get(params.developerId);
      const profile: DeveloperProfile = {
        developerId: params.developerId,
        displayName: params.displayName ?? existing?.displayName ?? params.developerId,
        email: params.email ?? existing?.email ?? null,
        githubLogin: params.githubLogin ?? existing?.githubLogin ?? null,
        githubId: params.githubId ?? existing?.githubId ?? null,
        jiraAccountId: params.jiraAccountId ?? existing?.jiraAccountId ?? null,
      };
      profiles.set(params.developerId, profile);
      return { profile, wasCreated: existing === undefined };
    },
  };
}
