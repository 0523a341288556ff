import path from "node:path";
import { appendOpsEvent } from "@/lib/ops/eventLog";
import { ANALYTICS_FILE, writeTextFile } from "@/lib/pipeline/reports";
import { buildAnalyticsReport, serializeAnalyticsReport } from "./index";
import { loadReports } from "./loadReports";
import type { AnalyticsReport } from "./types";

export type AnalyticsRunResult = {
  report: AnalyticsReport;
  outputPath: string;
  examCount: number;
};

export async function runAnalytics(options: {
  runId: string;
  reportDir: string;
  logDir?: string;
}): Promise<AnalyticsRunResult> {
  const { exams, quality } = await loadReports(options.reportDir);
  const report = buildAnalyticsReport(exams, quality);
  const outputPath = path.join(options.reportDir, ANALYTICS_FILE);
  await writeTextFile(outputPath, serializeAnalyticsReport(report));

  await appendOpsEvent(
    {
      type: "ANALYTICS_RUN_DONE",
      runId: options.runId,
      details: {
        exams: exams.length,
        questions: Object.keys(report.question_stats).length,
        skippedFiles: quality.skipped_files.length,
        skippedItems: quality.skipped_items.length,
      },
    },
    options.logDir
  );
  return { report, outputPath, examCount: exams.length };
}
