import { describe, test, expect } from "vitest";
import { calculateWorkload } from "./workload.ts";
import type { JiraIssueRecord } from "./types.ts";

function issue(
  key: string,
  status: string,
  priority: string | null,
  issueType: string,
): JiraIssueRecord {
  return {
    id: key,
    key,
    projectKey: "OPS",
    summary: `Summary of ${key}`,
    description: null,
    issueType,
    status,
    priority,
    labels: [],
    assigneeAccountId: "acc-1",
    assigneeDisplayName: "Jane Smith",
    assigneeEmail: "jane@example.com",
    reporterAccountId: null,
    createdAt: null,
    updatedAt: null,
    resolvedAt: null,
  };
}

describe("calculateWorkload", () => {
  test("weights active issues by priority, type and progress", () => {
    const workload = calculateWorkload("acc-1", [
      issue("OPS-1", "In Progress", "High", "Bug"),
      issue("OPS-2", "To Do", "Medium", "Story"),
      issue("OPS-3", "In Review", "Low", "Sub-task"),
      issue("OPS-4", "Done", "Highest", "Bug"),
      issue("OPS-5", "Reopened", null, "Epic"),
    ]);

    expect(workload).toEqual({
      jiraAccountId: "acc-1",
      displayName: "Jane Smith",
      email: "jane@example.com",
      openIssues: 2,
      inProgressIssues: 1,
      inReviewIssues: 1,
      totalActiveIssues: 4,
      highPriorityCount: 1,
      mediumPriorityCount: 1,
      lowPriorityCount: 1,
      bugsCount: 1,
      tasksCount: 1,
      storiesCount: 1,
      otherCount: 1,
      // 3 + 2 + 1 + 1.5 + 0.5
      workloadScore: 8,
    });
  });

  test("priority names are case-insensitive aliases", () => {
    const workload = calculateWorkload("acc-1", [
      issue("OPS-1", "Open", "BLOCKER", "Feature"),
      issue("OPS-2", "Open", "normal", "Task"),
      issue("OPS-3", "Open", "Trivial", "Task"),
    ]);
    expect(workload.highPriorityCount).toBe(1);
    expect(workload.mediumPriorityCount).toBe(1);
    expect(workload.lowPriorityCount).toBe(1);
    expect(workload.storiesCount).toBe(1);
    expect(workload.workloadScore).toBe(6);
  });

  test("no issues yields an empty workload", () => {
    const workload = calculateWorkload("acc-2", []);
    expect(workload.displayName).toBeNull();
    expect(workload.totalActiveIssues).toBe(0);
    expect(workload.workloadScore).toBe(0);
  });
});
