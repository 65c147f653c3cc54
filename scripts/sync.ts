/**
 * Sync GitHub pull requests and/or Jira issues into the vector store.
 *
 * Usage:
 *   tsx scripts/sync.ts --source github                   # every org member
 *   tsx scripts/sync.ts --source github --author jsmith   # one author
 *   tsx scripts/sync.ts --source jira --project OPS --open-only
 *   tsx scripts/sync.ts --source all
 *
 * Environment:
 *   DATABASE_URL                        PostgreSQL connection string (in-memory without it)
 *   VOYAGE_API_KEY                      VoyageAI API key
 *   GITHUB_TOKEN, GITHUB_ORG            GitHub access
 *   JIRA_URL, JIRA_EMAIL, JIRA_API_TOKEN, JIRA_PROJECT_KEYS   Jira access
 */

import { parseArgs } from "node:util";
import { loadConfig } from "../src/config.ts";
import { createLogger } from "../src/lib/logger.ts";
import { describeError } from "../src/lib/errors.ts";
import { createRuntime } from "../src/runtime.ts";
import type { SyncResult } from "../src/sync/types.ts";

const { values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    source: { type: "string" },
    author: { type: "string", multiple: true },
    project: { type: "string", multiple: true },
    "max-results": { type: "string" },
    "open-only": { type: "boolean" },
    "no-comments": { type: "boolean" },
    help: { type: "boolean" },
  },
});

if (values.help) {
  console.log(`
Usage: tsx scripts/sync.ts --source <github|jira|all> [options]

Options:
  --author <login>       GitHub author to sync (repeatable, default: every org member)
  --project <KEY>        Jira project to sync (repeatable, default: JIRA_PROJECT_KEYS or all)
  --max-results <n>      PRs per author / issues per project (default: 100)
  --open-only            Skip closed Jira issues
  --no-comments          Leave Jira comments out of the context
  --help                 Show this help
`);
  process.exit(0);
}

const source = values.source ?? "all";
if (source !== "github" && source !== "jira" && source !== "all") {
  console.error(`ERROR: --source must be github, jira or all, got "${source}"`);
  process.exit(1);
}

const maxResults = values["max-results"] === undefined ? undefined : Number(values["max-results"]);
if (maxResults !== undefined && (!Number.isInteger(maxResults) || maxResults < 1)) {
  console.error(`ERROR: --max-results must be a positive integer`);
  process.exit(1);
}

function printSummary(label: string, result: SyncResult): void {
  console.log();
  console.log("═══════════════════════════════════════");
  console.log(`  ${label} sync ${result.status}`);
  console.log("═══════════════════════════════════════");
  console.log(`  Scope:                ${result.scope.join(", ") || "(none)"}`);
  console.log(`  Items synced:         ${result.itemsSynced}`);
  console.log(`  Created / updated:    ${result.created} / ${result.updated}`);
  console.log(`  Embeddings generated: ${result.embeddingsGenerated}`);
  console.log(`  Errors:               ${result.errors.length}`);
  for (const message of result.errors) console.log(`    - ${message}`);
  console.log(`  Duration:             ${result.durationSeconds}s`);
  console.log("═══════════════════════════════════════");
}

async function main(): Promise<void> {
  const config = loadConfig();
  if (!config.ok) {
    console.error(`ERROR: ${config.error.message}`);
    process.exit(1);
  }
  const logger = createLogger(config.value.logLevel);

  const runtime = createRuntime(config.value, logger);
  if (!runtime.ok) {
    console.error(`ERROR: ${runtime.error.message}`);
    process.exit(1);
  }
  const { core } = runtime.value;

  let failed = false;
  try {
    if (source === "github" || source === "all") {
      const result = await core.syncGithub({
        authorLogins: values.author,
        maxPrsPerAuthor: maxResults,
      });
      printSummary("GitHub", result);
      failed ||= result.status === "failed";
    }

    if (source === "jira" || source === "all") {
      const projectKeys = values.project ?? config.value.jira?.projectKeys;
      const result = await core.syncJira({
        projectKeys,
        maxResults,
        includeClosed: !values["open-only"],
        syncComments: !values["no-comments"],
      });
      printSummary("Jira", result);
      failed ||= result.status === "failed";
    }
  } catch (err) {
    console.error(`ERROR: ${describeError(err)}`);
    failed = true;
  } finally {
    await runtime.value.close();
  }

  if (failed) process.exitCode = 1;
}

await main();
