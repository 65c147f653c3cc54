/**
 * Rank developers against a task description.
 *
 * Usage:
 *   tsx scripts/score-task.ts --title "Add retry to payment client" \
 *     --description "Timeouts from the payment API should be retried" --top 5
 *   tsx scripts/score-task.ts --title "..." --json
 */

import { parseArgs } from "node:util";
import { loadConfig } from "../src/config.ts";
import { createLogger } from "../src/lib/logger.ts";
import { describeError } from "../src/lib/errors.ts";
import { createRuntime } from "../src/runtime.ts";
import { composeTaskText } from "../src/scoring/score-service.ts";

const { values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    title: { type: "string" },
    description: { type: "string" },
    top: { type: "string" },
    json: { type: "boolean" },
    help: { type: "boolean" },
  },
});

if (values.help || !values.title) {
  console.log(`
Usage: tsx scripts/score-task.ts --title <text> [options]

Options:
  --title <text>         Task title (required)
  --description <text>   Task description
  --top <n>              Number of developers to return (default: 10)
  --json                 Print results as JSON
  --help                 Show this help
`);
  process.exit(values.help ? 0 : 1);
}

async function main(title: string): Promise<void> {
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

  try {
    const topN = values.top === undefined ? 10 : Number(values.top);
    const results = await runtime.value.core.scoreDevelopers(
      composeTaskText(title, values.description),
      topN,
    );

    if (values.json) {
      console.log(JSON.stringify(results, null, 2));
      return;
    }

    if (results.length === 0) {
      console.log("No developers found.");
      return;
    }

    results.forEach((result, index) => {
      console.log(
        `${index + 1}. ${result.displayName} (${result.developerId})  score ${result.aggregateScore.toFixed(2)}` +
          `  [PR ${result.breakdownBySource.PR.toFixed(2)} / ISSUE ${result.breakdownBySource.ISSUE.toFixed(2)}]`,
      );
      for (const item of result.contributingItems) {
        console.log(`     ${item.matchPercentage}%  ${item.sourceKind}  ${item.title}  ${item.url}`);
      }
    });
  } catch (err) {
    console.error(`ERROR: ${describeError(err)}`);
    process.exitCode = 1;
  } finally {
    await runtime.value.close();
  }
}

await main(values.title);
