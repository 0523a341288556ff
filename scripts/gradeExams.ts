import "dotenv/config";
import path from "node:path";
import { flagNumber, readFlags } from "@/lib/cli/args";
import { readGradingConfig } from "@/lib/grading/config";
import { createGradingOracle } from "@/lib/oracle";
import { logError, makeRunId } from "@/lib/ops/errors";
import { listExamInputs, loadAnswerKey, loadRubric } from "@/lib/pipeline/inputs";
import { runGradingPipeline } from "@/lib/pipeline/gradeExams";

/**
 * Grades OCR text files and writes per-exam reports, a summary CSV and the review queue.
 *
 * Usage:
 *   npm run grade -- --input-dir=examples/input --rubric=examples/config/rubric.txt
 *   npm run grade -- --mode=two-stage --confidence-threshold=85 --concurrency=4
 */
function parseArgs() {
  const flags = readFlags(process.argv.slice(2));
  return {
    inputDir: path.resolve(flags.get("input-dir") || "examples/input"),
    suffix: flags.get("suffix") || ".txt",
    answerKey: path.resolve(flags.get("answer-key") || "examples/config/answer_key.json"),
    rubric: path.resolve(flags.get("rubric") || "examples/config/rubric.txt"),
    outputDir: path.resolve(flags.get("output-dir") || "output"),
    overrides: {
      model: flags.get("model"),
      mode: flags.get("mode"),
      confidenceThreshold: flagNumber(flags, "confidence-threshold"),
      concurrency: flagNumber(flags, "concurrency"),
    },
  };
}

async function main() {
  const args = parseArgs();
  const runId = makeRunId();
  const { config, source } = readGradingConfig({ overrides: args.overrides });
  console.log(
    `[grade] run ${runId}: mode=${config.mode} model=${config.model} threshold=${config.confidenceThreshold} concurrency=${config.concurrency} (config: ${source})`
  );

  const inputs = await listExamInputs(args.inputDir, args.suffix);
  const [rubric, answerKey] = await Promise.all([loadRubric(args.rubric), loadAnswerKey(args.answerKey)]);
  const oracle = createGradingOracle(config);

  const run = await runGradingPipeline({
    runId,
    inputs,
    oracle,
    rubric,
    answerKey,
    confidenceThreshold: config.confidenceThreshold,
    concurrency: config.concurrency,
    outputDir: args.outputDir,
  });

  if (run.summaryPath) console.log(`[grade] summary written to ${run.summaryPath}`);
  if (run.totalFlagged > 0) {
    console.log(`[review] ${run.totalFlagged} item(s) need human review: ${run.reviewQueuePath}`);
  } else {
    console.log("[review] no items flagged for review.");
  }
  console.log(`[grade] done: ${run.results.length} graded, ${run.failures.length} failed.`);
  if (run.failures.length) process.exitCode = 1;
}

main().catch((e) => {
  logError({ scope: "grade", message: "Grading run aborted.", cause: e });
  process.exitCode = 1;
});
