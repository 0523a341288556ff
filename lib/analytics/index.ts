import { computeClassStats } from "./classStats";
import { generateInsights } from "./insights";
import { computeQuestionStats } from "./questionStats";
import type { AnalyticsReport, DataQuality, QuestionStats, ReportedExam } from "./types";

export { ANALYTICS_FILE, REPORT_SUFFIX } from "@/lib/pipeline/reports";
export { loadReports } from "./loadReports";
export { renderAnalytics } from "./render";
export type * from "./types";

function emptyQuality(): DataQuality {
  return { skipped_files: [], skipped_items: [], warnings: [] };
}

/** Pure fold from exam reports to the analytics report. Same input, same output. */
export function buildAnalyticsReport(
  exams: readonly ReportedExam[],
  quality: DataQuality = emptyQuality()
): AnalyticsReport {
  const classStats = computeClassStats(exams);
  const questionStats = computeQuestionStats(exams);

  // fromEntries defines own keys, so an id like "__proto__" stays a plain entry.
  const question_stats: Record<string, QuestionStats> = Object.fromEntries(
    questionStats.entries.map((entry) => [entry.questionId, entry.stats])
  );

  return {
    class_summary: classStats.stats,
    question_stats,
    insights: generateInsights(classStats.stats, questionStats.entries),
    data_quality: {
      skipped_files: [...quality.skipped_files],
      skipped_items: [...quality.skipped_items],
      warnings: [...quality.warnings, ...questionStats.warnings, ...classStats.warnings],
    },
  };
}

export function serializeAnalyticsReport(report: AnalyticsReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}
