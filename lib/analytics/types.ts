import type { ExamResult } from "@/lib/grading/types";

export type Difficulty = "Easy" | "Medium" | "Hard";

/** One graded item as read back from a persisted exam report. Verdict is free text here. */
export type ReportedItem = {
  readonly questionId: string;
  readonly awardedPoints: number;
  readonly maxPoints: number;
  readonly verdict: string;
  readonly confidence: number;
  readonly feedback: string;
};

export type ReportedExam = ExamResult<ReportedItem>;

export type VerdictBreakdown = {
  correct: number;
  partially_correct: number;
  incorrect: number;
};

export type QuestionStats = {
  total_students: number;
  max_points: number;
  avg_score: number;
  avg_score_pct: number;
  full_marks_count: number;
  zero_count: number;
  pass_rate: number;
  avg_confidence: number;
  difficulty: Difficulty;
  verdict_breakdown: VerdictBreakdown;
};

export type QuestionStatsEntry = { questionId: string; stats: QuestionStats };

export type EmptyClassStats = { total_students: 0 };

export type PopulatedClassStats = {
  total_students: number;
  class_average_pct: number;
  highest_score: number;
  lowest_score: number;
  total_possible: number;
  avg_total_awarded: number;
};

export type ClassStats = EmptyClassStats | PopulatedClassStats;

export type SkippedFile = { file: string; reason: string };
export type SkippedItem = { file: string; index: number; reason: string };

export type DataQuality = {
  skipped_files: SkippedFile[];
  skipped_items: SkippedItem[];
  warnings: string[];
};

export type AnalyticsReport = {
  class_summary: ClassStats;
  question_stats: Record<string, QuestionStats>;
  insights: string[];
  data_quality: DataQuality;
};

export function isPopulated(stats: ClassStats): stats is PopulatedClassStats {
  return stats.total_students > 0;
}
