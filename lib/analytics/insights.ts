import { ratioPct } from "./rounding";
import { isPopulated, type ClassStats, type QuestionStatsEntry } from "./types";

export const NO_DATA_INSIGHT = "No graded exam reports found; there is nothing to analyze yet.";

export function classAverageInsight(avg: number): string {
  if (avg < 50) return `Class average is ${avg}%, below passing. Consider reviewing core material.`;
  if (avg < 70) return `Class average is ${avg}%: acceptable, with room for improvement.`;
  return `Class average is ${avg}%: solid performance overall.`;
}

export function missRate(entry: QuestionStatsEntry): number {
  const { incorrect, partially_correct } = entry.stats.verdict_breakdown;
  return ratioPct(incorrect + partially_correct, entry.stats.total_students);
}

/**
 * Instructor-facing insights, in order: one class-level line, then per question (same order
 * as the statistics) a reteach or too-easy line, then an overall difficulty warning.
 */
export function generateInsights(classStats: ClassStats, questions: readonly QuestionStatsEntry[]): string[] {
  if (!isPopulated(classStats)) return [NO_DATA_INSIGHT];

  const insights = [classAverageInsight(classStats.class_average_pct)];

  for (const entry of questions) {
    const { stats } = entry;
    const miss = missRate(entry);
    if (miss >= 50) {
      insights.push(
        `${entry.questionId}: ${miss.toFixed(0)}% of students missed this question (avg ${stats.avg_score}/${stats.max_points}). Difficulty: ${stats.difficulty}. Consider reteaching this topic.`
      );
    } else if (stats.difficulty === "Easy" && stats.full_marks_count === stats.total_students) {
      insights.push(`${entry.questionId}: all students got full marks. Consider increasing difficulty.`);
    }
  }

  const hardCount = questions.filter((entry) => entry.stats.difficulty === "Hard").length;
  if (hardCount > questions.length / 2) {
    insights.push(`${hardCount}/${questions.length} questions rated Hard. The exam may be too difficult overall.`);
  }

  return insights;
}
