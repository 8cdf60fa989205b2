#!/usr/bin/env node
import { stringifyError } from "./common/errors.js";
import { buildRunConfig } from "./config.js";
import { formatPreview, formatRunSummary } from "./format.js";
import { run } from "./runner.js";

async function main(): Promise<void> {
  const config = buildRunConfig(process.argv.slice(2), process.env);
  const summary = await run(config);
  if (config.preview > 0) {
    process.stdout.write(`${formatPreview(summary.transformed, config.preview)}\n\n`);
  }
  process.stdout.write(`${formatRunSummary(summary)}\n`);
}

main().catch((error) => {
  process.stderr.write(`Fatal error: ${stringifyError(error)}\n`);
  process.exit(1);
});
