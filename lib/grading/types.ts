export const VERDICTS = ["correct", "partially_correct", "incorrect"] as const;

export type Verdict = (typeof VERDICTS)[number];

export type QuestionJudgment = {
  questionId: string;
  studentAnswer: string;
  awardedPoints: number;
  maxPoints: number;
  verdict: Verdict;
  // 0..100
  confidence: number;
  feedback: string;
};

export type GradedItem = Readonly<QuestionJudgment & { flaggedForReview: boolean }>;

export type ExtractedItem = {
  questionId: string;
  questionText: string;
  studentAnswer: string;
  transcriptionNotes: string[];
};

export type ScoredItem = {
  readonly awardedPoints: number;
  readonly maxPoints: number;
};

export type ReviewableItem = ScoredItem & { readonly flaggedForReview: boolean };

export type ExamResult<TItem extends ScoredItem = GradedItem> = {
  readonly examId: string;
  readonly items: readonly TItem[];
};

export function isVerdict(value: unknown): value is Verdict {
  return typeof value === "string" && (VERDICTS as readonly string[]).includes(value);
}
