#!/usr/bin/env node
import { formatReferenceAuditSummary, runReferenceAudit } from "./audit/referenceAudit.js";
import { stringifyError } from "./common/errors.js";
import { buildAuditConfig } from "./config.js";

async function main(): Promise<void> {
  const config = buildAuditConfig(process.argv.slice(2));
  const summary = await runReferenceAudit(config);
  process.stdout.write(`${formatReferenceAuditSummary(summary)}\n`);
  if (!summary.passed) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  process.stderr.write(`Fatal error: ${stringifyError(error)}\n`);
  process.exit(1);
});
