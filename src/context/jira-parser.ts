import { z } from "zod";
import { DataError } from "../lib/errors.ts";
import type { JiraComment, JiraIssue, JiraUser } from "./types.ts";

// ── Atlassian Document Format ───────────────────────────────────────────────

const BLOCK_NODES = new Set([
  "paragraph",
  "heading",
  "blockquote",
  "codeBlock",
  "listItem",
  "panel",
  "tableRow",
  "rule",
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function collectText(node: unknown, out: string[]): void {
  if (!isRecord(node)) return;

  if (node.type === "text" && typeof node.text === "string") {
    out.push(node.text);
  } else if (node.type === "hardBreak") {
    out.push("\n");
  } else if (node.type === "mention") {
    // dropped, like `[~user]` in wiki markup
    return;
  }

  if (Array.isArray(node.content)) {
    for (const child of node.content) collectText(child, out);
  }

  if (typeof node.type === "string" && BLOCK_NODES.has(node.type)) {
    out.push("\n");
  }
}

/**
 * Flatten a Jira v3 rich-text field to plain text. Plain strings (v2 API,
 * wiki markup) are returned unchanged; anything unrecognized becomes "".
 */
export function richTextToPlain(value: unknown): string {
  if (typeof value === "string") return value;
  if (!isRecord(value)) return "";
  const out: string[] = [];
  collectText(value, out);
  return out
    .join("")
    .replace(/\n{2,}/g, "\n")
    .trim();
}

// ── REST payload schema ─────────────────────────────────────────────────────

const userSchema = z.object({
  accountId: z.string().min(1),
  displayName: z.string().nullish(),
  emailAddress: z.string().nullish(),
  active: z.boolean().optional(),
});

const namedSchema = z.object({ name: z.string() }).nullish();

const commentSchema = z.object({
  id: z.string(),
  author: userSchema.nullish(),
  body: z.unknown(),
  created: z.string(),
  updated: z.string().nullish(),
});

export const jiraIssuePayloadSchema = z.object({
  id: z.string().min(1),
  key: z.string().regex(/^[A-Z][A-Z0-9_]*-\d+$/, "issue key must look like PROJ-123"),
  fields: z.object({
    summary: z.string().min(1),
    description: z.unknown().optional(),
    issuetype: namedSchema,
    status: namedSchema,
    priority: namedSchema,
    labels: z.array(z.string()).nullish(),
    assignee: userSchema.nullish(),
    reporter: userSchema.nullish(),
    created: z.string().nullish(),
    updated: z.string().nullish(),
    resolutiondate: z.string().nullish(),
    comment: z.object({ comments: z.array(commentSchema) }).nullish(),
  }),
});

export type JiraIssuePayload = z.infer<typeof jiraIssuePayloadSchema>;

function toUser(user: z.infer<typeof userSchema> | null | undefined): JiraUser | null {
  if (!user) return null;
  return {
    accountId: user.accountId,
    displayName: user.displayName ?? null,
    emailAddress: user.emailAddress ?? null,
    active: user.active ?? true,
  };
}

function toDate(value: string | null | undefined): Date | null {
  if (!value) return null;
  // Jira sends offsets without a colon: 2025-02-01T09:00:00.000+0000
  const date = new Date(value.replace(/([+-]\d{2})(\d{2})$/, "$1:$2"));
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Validate a Jira REST issue payload and map it onto the JiraIssue view.
 * Throws DataError naming the first offending field.
 */
export function parseJiraIssue(raw: unknown, opts: { includeComments?: boolean } = {}): JiraIssue {
  const parsed = jiraIssuePayloadSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid payload";
    const key = isRecord(raw) && typeof raw.key === "string" ? raw.key : "unknown issue";
    throw new DataError(`Malformed Jira issue ${key} (${where})`);
  }

  const { id, key, fields } = parsed.data;
  const includeComments = opts.includeComments ?? true;

  const comments: JiraComment[] = [];
  if (includeComments) {
    for (const c of fields.comment?.comments ?? []) {
      comments.push({
        id: c.id,
        author: toUser(c.author),
        body: richTextToPlain(c.body),
        created: toDate(c.created) ?? new Date(0),
        updated: toDate(c.updated),
      });
    }
  }

  const description = richTextToPlain(fields.description);

  return {
    id,
    key,
    summary: fields.summary,
    description: description || null,
    issueType: fields.issuetype?.name ?? "Unknown",
    status: fields.status?.name ?? "Unknown",
    priority: fields.priority?.name ?? null,
    labels: fields.labels ?? [],
    assignee: toUser(fields.assignee),
    reporter: toUser(fields.reporter),
    comments,
    created: toDate(fields.created),
    updated: toDate(fields.updated),
    resolved: toDate(fields.resolutiondate),
  };
}
