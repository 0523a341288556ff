import { examPercentage, totalAwarded, totalMax } from "@/lib/grading/examResult";
import { mean, round1, round2 } from "./rounding";
import type { ClassStats, ReportedExam } from "./types";

/**
 * Class-level statistics over the exams of a run. `total_possible` is the first exam's
 * maximum; exams that disagree are reported, never averaged.
 */
export function computeClassStats(exams: readonly ReportedExam[]): { stats: ClassStats; warnings: string[] } {
  if (!exams.length) return { stats: { total_students: 0 }, warnings: [] };

  const totals = exams.map((exam) => ({
    examId: exam.examId,
    totalAwarded: totalAwarded(exam),
    totalMax: totalMax(exam),
    percentage: examPercentage(exam),
  }));
  const percentages = totals.map((t) => t.percentage);
  const totalPossible = totals[0].totalMax;

  const mismatched = totals.filter((t) => t.totalMax !== totalPossible);
  const warnings = mismatched.length
    ? [
        `total_max differs across exams: ${mismatched
          .map((t) => `${t.examId}=${t.totalMax}`)
          .join(", ")} vs ${totals[0].examId}=${totalPossible}; total_possible uses ${totals[0].examId}.`,
      ]
    : [];

  return {
    stats: {
      total_students: exams.length,
      class_average_pct: round1(mean(percentages)),
      highest_score: round1(percentages.reduce((a, b) => Math.max(a, b))),
      lowest_score: round1(percentages.reduce((a, b) => Math.min(a, b))),
      total_possible: totalPossible,
      avg_total_awarded: round2(mean(totals.map((t) => t.totalAwarded))),
    },
    warnings,
  };
}
