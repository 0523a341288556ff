import "dotenv/config";
import path from "node:path";
import { renderAnalytics } from "@/lib/analytics";
import { runAnalytics } from "@/lib/analytics/run";
import { readFlags } from "@/lib/cli/args";
import { logError, makeRunId } from "@/lib/ops/errors";

/**
 * Class analytics over graded reports.
 *
 * Usage:
 *   npm run analytics -- --output-dir=output
 */
async function main() {
  const flags = readFlags(process.argv.slice(2));
  const reportDir = path.resolve(flags.get("output-dir") || "output");
  const run = await runAnalytics({ runId: makeRunId(), reportDir });
  if (!run.examCount) {
    console.log(`[analytics] no *_report.json files found in ${reportDir}`);
  }
  console.log(renderAnalytics(run.report));
  console.log(`[analytics] saved to ${run.outputPath}`);
}

main().catch((e) => {
  logError({ scope: "analytics", message: "Analytics run aborted.", cause: e });
  process.exitCode = 1;
});
