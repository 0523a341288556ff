import type { ReportedExam, ReportedItem } from "@/lib/analytics/types";

export function item(overrides: Partial<ReportedItem> & Pick<ReportedItem, "questionId">): ReportedItem {
  return {
    awardedPoints: 10,
    maxPoints: 10,
    verdict: "correct",
    confidence: 100,
    feedback: "",
    ...overrides,
  };
}

export function exam(examId: string, items: ReportedItem[]): ReportedExam {
  return { examId, items };
}
