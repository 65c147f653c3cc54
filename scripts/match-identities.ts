/**
 * Pair GitHub organization members with Jira users and, with --apply,
 * link each pair into the developer directory.
 *
 * Usage:
 *   tsx scripts/match-identities.ts                 # report only
 *   tsx scripts/match-identities.ts --threshold 85 --apply
 */

import { parseArgs } from "node:util";
import { loadConfig } from "../src/config.ts";
import { DEFAULT_MATCH_THRESHOLD } from "../src/identity/identity-matcher.ts";
import { createLogger } from "../src/lib/logger.ts";
import { describeError } from "../src/lib/errors.ts";
import { linkMatchedIdentities } from "../src/profiles/link-identities.ts";
import { createRuntime } from "../src/runtime.ts";

const { values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    threshold: { type: "string" },
    apply: { type: "boolean" },
    help: { type: "boolean" },
  },
});

if (values.help) {
  console.log(`
Usage: tsx scripts/match-identities.ts [options]

Options:
  --threshold <0-100>   Minimum match score (default: ${DEFAULT_MATCH_THRESHOLD})
  --apply               Link matched identities into developer profiles
  --help                Show this help
`);
  process.exit(0);
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
  const { core, directory } = runtime.value;

  try {
    const threshold = values.threshold === undefined ? undefined : Number(values.threshold);
    const matches = await core.matchIdentities(threshold);

    for (const { github, jira, score } of matches) {
      console.log(`${github.login} -> ${jira.displayName ?? jira.accountId} (${jira.accountId})  ${score}`);
    }

    if (!values.apply) {
      console.log(`${matches.length} match(es).`);
      return;
    }

    const result = await linkMatchedIdentities({ directory, matches, logger });
    for (const failure of result.failures) console.error(`ERROR: ${failure}`);
    console.log(
      `${result.linked} of ${matches.length} match(es) linked (${result.created} new profile(s)).`,
    );
    if (result.failures.length > 0) process.exitCode = 1;
  } catch (err) {
    console.error(`ERROR: ${describeError(err)}`);
    process.exitCode = 1;
  } finally {
    await runtime.value.close();
  }
}

await main();
