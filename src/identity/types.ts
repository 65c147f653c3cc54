import type { JiraUser } from "../context/types.ts";

/** A GitHub organization member as the matcher sees it. */
export type GithubIdentity = {
  login: string;
  id: number;
  name: string | null;
  email: string | null;
};

export type JiraIdentity = JiraUser;

export type IdentityMatch = {
  github: GithubIdentity;
  jira: JiraIdentity;
  /** 0-100, two decimals. */
  score: number;
};
