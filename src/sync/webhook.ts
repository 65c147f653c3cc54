import type { Logger } from "pino";
import { z } from "zod";
import { buildJiraIssueContext, issueEntityId } from "../context/jira-context.ts";
import { parseJiraIssue } from "../context/jira-parser.ts";
import type { EmbeddingProvider } from "../embedding/types.ts";
import { describeError } from "../lib/errors.ts";
import type { JiraIssueStore } from "../profiles/types.ts";
import type { VectorStore } from "../store/types.ts";
import { storeContextEmbeddings } from "./store-contexts.ts";
import type { JiraIssueSource } from "./types.ts";

const webhookEventSchema = z.object({
  webhookEvent: z.string(),
  issue: z
    .object({
      id: z.string(),
      key: z.string(),
    })
    .passthrough()
    .optional(),
});

export type JiraWebhookResult = {
  eventType: string;
  processed: boolean;
  issueKey?: string;
  action?: "created" | "updated" | "deleted";
  error?: string;
};

/**
 * Apply one Jira webhook delivery. Created/updated issues are re-fetched
 * in full and re-synced; deleted issues are removed together with their
 * embedding. Failures are logged and reported in the result.
 */
export async function processJiraWebhookEvent(
  deps: {
    source: JiraIssueSource;
    provider: EmbeddingProvider;
    store: VectorStore;
    issueStore: JiraIssueStore;
    logger: Logger;
  },
  payload: unknown,
): Promise<JiraWebhookResult> {
  const { source, provider, store, issueStore, logger } = deps;

  const parsed = webhookEventSchema.safeParse(payload);
  if (!parsed.success) {
    logger.warn({ issues: parsed.error.issues }, "Ignoring malformed Jira webhook payload");
    return { eventType: "unknown", processed: false, error: "Malformed webhook payload" };
  }

  const { webhookEvent: eventType, issue } = parsed.data;
  if (!issue) return { eventType, processed: false };

  try {
    switch (eventType) {
      case "jira:issue_created":
      case "jira:issue_updated": {
        const full = parseJiraIssue(await source.getIssue(issue.key));
        const { wasCreated } = await issueStore.upsert(full);

        const context = buildJiraIssueContext(full, source.siteUrl);
        const { errors } = await storeContextEmbeddings({
          contexts: [context],
          provider,
          store,
          logger,
        });
        if (errors.length > 0) {
          logger.warn({ issueKey: full.key, errors }, "Webhook issue stored without embedding");
        }

        const action = wasCreated ? "created" : "updated";
        logger.info({ eventType, issueKey: full.key, action }, "Processed Jira webhook");
        return { eventType, processed: true, issueKey: full.key, action };
      }

      case "jira:issue_deleted": {
        await issueStore.delete(issue.id);
        await store.delete(issueEntityId(issue.id));
        logger.info({ eventType, issueKey: issue.key }, "Processed Jira webhook");
        return { eventType, processed: true, issueKey: issue.key, action: "deleted" };
      }

      default:
        logger.debug({ eventType }, "Ignoring unhandled Jira webhook event");
        return { eventType, processed: false };
    }
  } catch (err) {
    logger.error({ err, eventType, issueKey: issue.key }, "Error processing Jira webhook");
    return { eventType, processed: false, issueKey: issue.key, error: describeError(err) };
  }
}
