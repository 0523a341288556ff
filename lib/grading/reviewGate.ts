import type { ExamResult, GradedItem, QuestionJudgment } from "./types";

export const DEFAULT_CONFIDENCE_THRESHOLD = 80;

export function normalizeConfidenceThreshold(value: unknown): number {
  const n = Number(value);
  if (value === null || value === undefined || value === "" || !Number.isFinite(n)) {
    return DEFAULT_CONFIDENCE_THRESHOLD;
  }
  return Math.max(0, Math.min(100, n));
}

/**
 * Partial credit is where human graders most often disagree with the model, so it is
 * routed to review whatever confidence the model reports.
 */
export function flagForReview(verdict: string, confidence: number, threshold: number): boolean {
  return confidence < threshold || verdict === "partially_correct";
}

export function toGradedItem(judgment: QuestionJudgment, threshold: number): GradedItem {
  return Object.freeze({
    ...judgment,
    flaggedForReview: flagForReview(judgment.verdict, judgment.confidence, threshold),
  });
}

export function buildExamResult(
  examId: string,
  judgments: readonly QuestionJudgment[],
  threshold: number = DEFAULT_CONFIDENCE_THRESHOLD
): ExamResult {
  const items = judgments.map((judgment) => toGradedItem(judgment, threshold));
  return Object.freeze({ examId, items: Object.freeze(items) });
}
