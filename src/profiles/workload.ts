import type { DeveloperWorkload, JiraIssueRecord } from "./types.ts";

const ACTIVE_STATUSES = new Set(["Open", "To Do", "In Progress", "In Review", "Reopened"]);
const OPEN_STATUSES = new Set(["Open", "To Do", "Reopened"]);

const HIGH_PRIORITIES = new Set(["highest", "high", "critical", "blocker"]);
const MEDIUM_PRIORITIES = new Set(["medium", "normal"]);
const LOW_PRIORITIES = new Set(["low", "lowest", "trivial"]);

const WEIGHTS = {
  high: 3,
  medium: 2,
  low: 1,
  bug: 1.5,
  inProgress: 0.5,
} as const;

/**
 * Weighted busyness of one assignee over their active issues.
 * Closed or unknown statuses do not count.
 */
export function calculateWorkload(
  accountId: string,
  issues: readonly JiraIssueRecord[],
): DeveloperWorkload {
  const first = issues[0];
  const workload: DeveloperWorkload = {
    jiraAccountId: accountId,
    displayName: first?.assigneeDisplayName ?? null,
    email: first?.assigneeEmail ?? null,
    openIssues: 0,
    inProgressIssues: 0,
    inReviewIssues: 0,
    totalActiveIssues: 0,
    highPriorityCount: 0,
    mediumPriorityCount: 0,
    lowPriorityCount: 0,
    bugsCount: 0,
    tasksCount: 0,
    storiesCount: 0,
    otherCount: 0,
    workloadScore: 0,
  };

  for (const issue of issues) {
    if (!ACTIVE_STATUSES.has(issue.status)) continue;

    if (OPEN_STATUSES.has(issue.status)) workload.openIssues++;
    else if (issue.status === "In Progress") workload.inProgressIssues++;
    else workload.inReviewIssues++;

    const priority = (issue.priority ?? "").toLowerCase();
    if (HIGH_PRIORITIES.has(priority)) workload.highPriorityCount++;
    else if (MEDIUM_PRIORITIES.has(priority)) workload.mediumPriorityCount++;
    else if (LOW_PRIORITIES.has(priority)) workload.lowPriorityCount++;

    const issueType = issue.issueType.toLowerCase();
    if (issueType.includes("bug")) workload.bugsCount++;
    else if (issueType.includes("task")) workload.tasksCount++;
    else if (issueType.includes("story") || issueType.includes("feature")) workload.storiesCount++;
    else workload.otherCount++;
  }

  workload.totalActiveIssues =
    workload.openIssues + workload.inProgressIssues + workload.inReviewIssues;

  const score =
    workload.highPriorityCount * WEIGHTS.high +
    workload.mediumPriorityCount * WEIGHTS.medium +
    workload.lowPriorityCount * WEIGHTS.low +
    workload.bugsCount * WEIGHTS.bug +
    workload.inProgressIssues * WEIGHTS.inProgress;
  workload.workloadScore = Math.round(score * 100) / 100;

  return workload;
}
