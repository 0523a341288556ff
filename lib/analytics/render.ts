import { isPopulated, type AnalyticsReport } from "./types";

const RULE = "=".repeat(60);

function pad(value: string | number, width: number) {
  return String(value).padEnd(width);
}

export function renderAnalytics(report: AnalyticsReport): string {
  const lines = ["", RULE, "CLASS ANALYTICS REPORT", RULE];
  const summary = report.class_summary;

  lines.push("", "Class Summary", `   Students:       ${summary.total_students}`);
  if (isPopulated(summary)) {
    lines.push(
      `   Class Average:  ${summary.class_average_pct}%`,
      `   Highest Score:  ${summary.highest_score}%`,
      `   Lowest Score:   ${summary.lowest_score}%`,
      `   Total Possible: ${summary.total_possible}`
    );
  }

  const questionIds = Object.keys(report.question_stats);
  if (questionIds.length) {
    lines.push(
      "",
      "Per-Question Breakdown",
      `   ${pad("Question", 10)} ${pad("Avg Score", 12)} ${pad("Pass Rate", 12)} ${pad("Difficulty", 12)} ${pad("Correct", 10)} ${pad("Partial", 10)} ${pad("Wrong", 10)}`
    );
    for (const questionId of questionIds) {
      const qs = report.question_stats[questionId];
      const vb = qs.verdict_breakdown;
      lines.push(
        `   ${pad(questionId, 10)} ${pad(`${qs.avg_score}/${qs.max_points}`, 12)} ${pad(`${qs.pass_rate}%`, 12)} ${pad(qs.difficulty, 12)} ${pad(vb.correct, 10)} ${pad(vb.partially_correct, 10)} ${pad(vb.incorrect, 10)}`.trimEnd()
      );
    }
  }

  lines.push("", "Insights");
  report.insights.forEach((insight, i) => lines.push(`   ${i + 1}. ${insight}`));

  const quality = report.data_quality;
  if (quality.skipped_files.length || quality.skipped_items.length || quality.warnings.length) {
    lines.push(
      "",
      "Data Quality",
      `   Skipped files:  ${quality.skipped_files.length}`,
      `   Skipped items:  ${quality.skipped_items.length}`
    );
    for (const warning of quality.warnings) lines.push(`   - ${warning}`);
  }

  lines.push("", RULE);
  return lines.join("\n");
}
