import fs from "node:fs/promises";
import path from "node:path";
import { summarizeExam } from "@/lib/grading/examResult";
import { buildExamResult } from "@/lib/grading/reviewGate";
import type { ExamResult } from "@/lib/grading/types";
import type { AnswerKey, GradingOracle } from "@/lib/oracle";
import { appendOpsEvent } from "@/lib/ops/eventLog";
import { errorCode, isOracleError, logError, toErrorMessage } from "@/lib/ops/errors";
import type { ExamInput } from "./inputs";
import {
  buildExamReport,
  buildReviewQueue,
  buildSummaryRow,
  reportFileName,
  toSummaryCsv,
  writeJsonFile,
  writeTextFile,
} from "./reports";
import { runWithLimit } from "./workerPool";

export type ExamFailure = {
  examId: string;
  code: string;
  kind: string | null;
  message: string;
};

type ExamOutcome = { ok: true; result: ExamResult; reportPath: string } | { ok: false; failure: ExamFailure };

export type GradingRunOptions = {
  runId: string;
  inputs: ExamInput[];
  oracle: GradingOracle;
  rubric: string;
  answerKey: AnswerKey | null;
  confidenceThreshold: number;
  concurrency: number;
  outputDir: string;
  // Directory for `.ops-events.jsonl`; defaults to the working directory.
  logDir?: string;
};

export type GradingRunResult = {
  results: ExamResult[];
  failures: ExamFailure[];
  summaryPath: string | null;
  reviewQueuePath: string;
  totalFlagged: number;
};

export const SUMMARY_FILE = "grades_summary.csv";
export const REVIEW_QUEUE_FILE = "review_queue.json";

async function gradeOne(input: ExamInput, options: GradingRunOptions): Promise<ExamOutcome> {
  try {
    const reportPath = path.join(options.outputDir, reportFileName(input.examId));
    const examText = await fs.readFile(input.filePath, "utf8");
    const { judgments, extractedItems } = await options.oracle.judge({
      examId: input.examId,
      examText,
      rubric: options.rubric,
      answerKey: options.answerKey,
    });
    const result = buildExamResult(input.examId, judgments, options.confidenceThreshold);
    await writeJsonFile(reportPath, buildExamReport(result, extractedItems));

    const totals = summarizeExam(result);
    const flagInfo = totals.flaggedCount > 0 ? `  ${totals.flaggedCount} flagged for review` : "";
    console.log(
      `[grade] OK ${input.examId}: ${totals.totalAwarded.toFixed(2)}/${totals.totalMax.toFixed(2)} (${totals.percentage.toFixed(2)}%)${flagInfo}`
    );
    await appendOpsEvent(
      {
        type: "EXAM_GRADED",
        runId: options.runId,
        examId: input.examId,
        details: { mode: options.oracle.mode, percentage: totals.percentage, flaggedCount: totals.flaggedCount },
      },
      options.logDir
    );
    return { ok: true, result, reportPath };
  } catch (e) {
    const failure: ExamFailure = {
      examId: input.examId,
      code: errorCode(e),
      kind: isOracleError(e) ? e.kind : null,
      message: toErrorMessage(e),
    };
    logError({ scope: "grade", runId: options.runId, message: `Grading failed for ${input.examId}.`, cause: e });
    console.log(`[grade] FAILED ${input.examId}: ${failure.message}`);
    await appendOpsEvent(
      { type: "EXAM_FAILED", runId: options.runId, examId: input.examId, details: { ...failure } },
      options.logDir
    );
    return { ok: false, failure };
  }
}

/**
 * Grades every input through the oracle, isolating failures per exam. Outputs are written
 * only after all exams have settled, in input order.
 */
export async function runGradingPipeline(options: GradingRunOptions): Promise<GradingRunResult> {
  const outcomes = await runWithLimit(
    options.inputs.map((input) => () => gradeOne(input, options)),
    options.concurrency
  );

  const results: ExamResult[] = [];
  const failures: ExamFailure[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) results.push(outcome.result);
    else failures.push(outcome.failure);
  }

  let summaryPath: string | null = null;
  if (results.length) {
    summaryPath = path.join(options.outputDir, SUMMARY_FILE);
    await writeTextFile(summaryPath, toSummaryCsv(results.map(buildSummaryRow)));
  }

  const reviewQueue = buildReviewQueue(results);
  const reviewQueuePath = path.join(options.outputDir, REVIEW_QUEUE_FILE);
  await writeJsonFile(reviewQueuePath, reviewQueue);

  await appendOpsEvent(
    {
      type: "GRADING_RUN_DONE",
      runId: options.runId,
      details: {
        mode: options.oracle.mode,
        graded: results.length,
        failed: failures.length,
        totalFlagged: reviewQueue.total_flagged,
      },
    },
    options.logDir
  );

  return { results, failures, summaryPath, reviewQueuePath, totalFlagged: reviewQueue.total_flagged };
}
