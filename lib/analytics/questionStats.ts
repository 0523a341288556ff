import { compareIds, mean, ratioPct, round1, round2 } from "./rounding";
import type { Difficulty, QuestionStatsEntry, ReportedExam, ReportedItem, VerdictBreakdown } from "./types";

type QuestionAccumulator = {
  scores: number[];
  confidences: number[];
  verdicts: string[];
  maxPoints: number;
  maxPointsFrom: string;
};

export function classifyDifficulty(avgScorePct: number): Difficulty {
  if (avgScorePct >= 80) return "Easy";
  if (avgScorePct >= 50) return "Medium";
  return "Hard";
}

// Verdicts outside the three known values are not counted anywhere.
export function countVerdicts(verdicts: readonly string[]): VerdictBreakdown {
  const breakdown: VerdictBreakdown = { correct: 0, partially_correct: 0, incorrect: 0 };
  for (const verdict of verdicts) {
    if (verdict === "correct" || verdict === "partially_correct" || verdict === "incorrect") {
      breakdown[verdict] += 1;
    }
  }
  return breakdown;
}

function accumulate(
  groups: Map<string, QuestionAccumulator>,
  examId: string,
  item: ReportedItem,
  warnings: string[]
) {
  const group = groups.get(item.questionId);
  if (!group) {
    groups.set(item.questionId, {
      scores: [item.awardedPoints],
      confidences: [item.confidence],
      verdicts: [item.verdict],
      maxPoints: item.maxPoints,
      maxPointsFrom: examId,
    });
    return;
  }
  if (group.maxPoints !== item.maxPoints) {
    warnings.push(
      `${item.questionId}: max_points ${group.maxPoints} (exam ${group.maxPointsFrom}) differs from ${item.maxPoints} (exam ${examId}); using the last value.`
    );
  }
  group.scores.push(item.awardedPoints);
  group.confidences.push(item.confidence);
  group.verdicts.push(item.verdict);
  // Last write wins, in report order.
  group.maxPoints = item.maxPoints;
  group.maxPointsFrom = examId;
}

/**
 * Per-question statistics across all exams of a run, in code-unit order of question id.
 * Full marks, zero and pass are judged against the question's final (last-seen) max_points.
 */
export function computeQuestionStats(exams: readonly ReportedExam[]): {
  entries: QuestionStatsEntry[];
  warnings: string[];
} {
  const groups = new Map<string, QuestionAccumulator>();
  const warnings: string[] = [];
  for (const exam of exams) {
    for (const item of exam.items) accumulate(groups, exam.examId, item, warnings);
  }

  const entries = Array.from(groups.keys())
    .sort(compareIds)
    .map((questionId): QuestionStatsEntry => {
      const group = groups.get(questionId);
      if (!group) throw new Error(`Question group ${questionId} vanished during aggregation.`);
      const { scores, maxPoints } = group;
      const totalStudents = scores.length;
      const avgScore = mean(scores);
      const avgScorePct = maxPoints > 0 ? (avgScore / maxPoints) * 100 : 0;
      const passCount = scores.filter((s) => s >= maxPoints * 0.5).length;
      return {
        questionId,
        stats: {
          total_students: totalStudents,
          max_points: maxPoints,
          avg_score: round2(avgScore),
          avg_score_pct: round1(avgScorePct),
          full_marks_count: scores.filter((s) => s >= maxPoints).length,
          zero_count: scores.filter((s) => s <= 0).length,
          pass_rate: round1(ratioPct(passCount, totalStudents)),
          avg_confidence: round1(mean(group.confidences)),
          difficulty: classifyDifficulty(avgScorePct),
          verdict_breakdown: countVerdicts(group.verdicts),
        },
      };
    });

  return { entries, warnings };
}
