import type { Octokit, RestEndpointMethodTypes } from "@octokit/rest";
import type { Logger } from "pino";
import type { GithubPullRequest, GithubUserRef } from "../context/types.ts";
import type { GithubIdentity } from "../identity/types.ts";
import { describeError } from "../lib/errors.ts";
import type { PullRequestListing, PullRequestSource } from "./types.ts";

type PullListItem = RestEndpointMethodTypes["pulls"]["list"]["response"]["data"][number];

/**
 * PullRequestSource over the GitHub REST API. Walks every repository of the
 * organization; repositories and PRs that cannot be read are skipped and
 * reported in the listing's `errors`.
 */
export function createOctokitPullRequestSource(opts: {
  octokit: Octokit;
  org: string;
  logger: Logger;
}): PullRequestSource {
  const { octokit, org, logger } = opts;

  async function toPullRequest(repo: string, repoFullName: string, pr: PullListItem): Promise<GithubPullRequest> {
    const files = await octokit.paginate(octokit.rest.pulls.listFiles, {
      owner: org,
      repo,
      pull_number: pr.number,
      per_page: 100,
    });
    const commits = await octokit.paginate(octokit.rest.pulls.listCommits, {
      owner: org,
      repo,
      pull_number: pr.number,
      per_page: 100,
    });

    return {
      id: pr.id,
      number: pr.number,
      title: pr.title,
      body: pr.body ?? null,
      htmlUrl: pr.html_url,
      repoFullName,
      labels: pr.labels.map((label) => label.name),
      files: files.map((f) => ({ filename: f.filename, status: f.status })),
      commitMessages: commits.map((c) => c.commit.message),
      author: pr.user ? { login: pr.user.login, id: pr.user.id } : null,
    };
  }

  return {
    async listOrgMembers(): Promise<GithubIdentity[]> {
      const members = await octokit.paginate(octokit.rest.orgs.listMembers, {
        org,
        per_page: 100,
      });

      const identities: GithubIdentity[] = [];
      for (const member of members) {
        try {
          const { data } = await octokit.rest.users.getByUsername({ username: member.login });
          identities.push({
            login: member.login,
            id: member.id,
            name: data.name ?? null,
            email: data.email ?? null,
          });
        } catch (err) {
          // fail-open: keep the member without name and email
          logger.warn({ err, login: member.login }, "Failed to fetch GitHub profile");
          identities.push({ login: member.login, id: member.id, name: null, email: null });
        }
      }

      logger.debug({ org, members: identities.length }, "Listed organization members");
      return identities;
    },

    async listClosedPullRequests(author: GithubUserRef, maxPrs: number): Promise<PullRequestListing> {
      const pullRequests: GithubPullRequest[] = [];
      const errors: string[] = [];
      if (maxPrs <= 0) return { pullRequests, errors };

      const repos = await octokit.paginate(octokit.rest.repos.listForOrg, {
        org,
        per_page: 100,
      });

      for (const repo of repos) {
        try {
          for await (const response of octokit.paginate.iterator(octokit.rest.pulls.list, {
            owner: org,
            repo: repo.name,
            state: "closed",
            sort: "updated",
            direction: "desc",
            per_page: 100,
          })) {
            for (const pr of response.data) {
              if (pr.user?.id !== author.id) continue;
              try {
                pullRequests.push(await toPullRequest(repo.name, repo.full_name, pr));
              } catch (err) {
                logger.warn({ err, repo: repo.full_name, number: pr.number }, "Skipping pull request");
                errors.push(`Error fetching pull request ${repo.full_name}#${pr.number}: ${describeError(err)}`);
                continue;
              }
              if (pullRequests.length >= maxPrs) return { pullRequests, errors };
            }
          }
        } catch (err) {
          logger.warn({ err, repo: repo.full_name }, "Skipping repository");
          errors.push(`Error listing pull requests in ${repo.full_name}: ${describeError(err)}`);
        }
      }

      return { pullRequests, errors };
    },
  };
}
