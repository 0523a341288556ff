import type { ExamResult, ReviewableItem, ScoredItem } from "./types";

export type ExamTotals<TItem extends ReviewableItem> = {
  totalAwarded: number;
  totalMax: number;
  percentage: number;
  flaggedItems: TItem[];
  flaggedCount: number;
};

export function totalAwarded(result: ExamResult<ScoredItem>): number {
  return result.items.reduce((sum, item) => sum + item.awardedPoints, 0);
}

export function totalMax(result: ExamResult<ScoredItem>): number {
  return result.items.reduce((sum, item) => sum + item.maxPoints, 0);
}

export function examPercentage(result: ExamResult<ScoredItem>): number {
  const max = totalMax(result);
  if (max <= 0) return 0;
  return (totalAwarded(result) / max) * 100;
}

export function flaggedItems<TItem extends ReviewableItem>(result: ExamResult<TItem>): TItem[] {
  return result.items.filter((item) => item.flaggedForReview);
}

// Derived on every call from `items`; nothing is cached on the result.
export function summarizeExam<TItem extends ReviewableItem>(result: ExamResult<TItem>): ExamTotals<TItem> {
  const flagged = flaggedItems(result);
  return {
    totalAwarded: totalAwarded(result),
    totalMax: totalMax(result),
    percentage: examPercentage(result),
    flaggedItems: flagged,
    flaggedCount: flagged.length,
  };
}
