import { describe, expect, it } from "vitest";
import { classifyDifficulty, computeQuestionStats, countVerdicts } from "@/lib/analytics/questionStats";
import { exam, item } from "./fixtures";

describe("classifyDifficulty", () => {
  it("uses inclusive lower bounds at 80 and 50", () => {
    expect(classifyDifficulty(80)).toBe("Easy");
    expect(classifyDifficulty(79.99)).toBe("Medium");
    expect(classifyDifficulty(50)).toBe("Medium");
    expect(classifyDifficulty(49.99)).toBe("Hard");
    expect(classifyDifficulty(0)).toBe("Hard");
  });
});

describe("countVerdicts", () => {
  it("ignores verdicts outside the known three", () => {
    expect(countVerdicts(["correct", "partially_correct", "incorrect", "Correct", "unsure", ""])).toEqual({
      correct: 1,
      partially_correct: 1,
      incorrect: 1,
    });
  });
});

describe("computeQuestionStats", () => {
  it("rates a question everyone aced as Easy with full marks", () => {
    const { entries, warnings } = computeQuestionStats([
      exam("s1", [item({ questionId: "Q1" })]),
      exam("s2", [item({ questionId: "Q1" })]),
      exam("s3", [item({ questionId: "Q1" })]),
    ]);
    expect(warnings).toEqual([]);
    expect(entries).toEqual([
      {
        questionId: "Q1",
        stats: {
          total_students: 3,
          max_points: 10,
          avg_score: 10,
          avg_score_pct: 100,
          full_marks_count: 3,
          zero_count: 0,
          pass_rate: 100,
          avg_confidence: 100,
          difficulty: "Easy",
          verdict_breakdown: { correct: 3, partially_correct: 0, incorrect: 0 },
        },
      },
    ]);
  });

  it("computes averages, pass rate and rounding", () => {
    const { entries } = computeQuestionStats([
      exam("s1", [item({ questionId: "Q2", awardedPoints: 5, confidence: 90, verdict: "partially_correct" })]),
      exam("s2", [item({ questionId: "Q2", awardedPoints: 0, confidence: 70, verdict: "incorrect" })]),
      exam("s3", [item({ questionId: "Q2", awardedPoints: 2, confidence: 61, verdict: "mystery" })]),
    ]);
    expect(entries[0].stats).toEqual({
      total_students: 3,
      max_points: 10,
      avg_score: 2.33,
      avg_score_pct: 23.3,
      full_marks_count: 0,
      zero_count: 1,
      pass_rate: 33.3,
      avg_confidence: 73.7,
      difficulty: "Hard",
      verdict_breakdown: { correct: 0, partially_correct: 1, incorrect: 1 },
    });
  });

  it("orders questions by id code units", () => {
    const { entries } = computeQuestionStats([
      exam("s1", [item({ questionId: "Q2" }), item({ questionId: "Q10" }), item({ questionId: "Q1" })]),
    ]);
    expect(entries.map((entry) => entry.questionId)).toEqual(["Q1", "Q10", "Q2"]);
  });

  it("keeps the last max_points and reports the disagreement", () => {
    const { entries, warnings } = computeQuestionStats([
      exam("s1", [item({ questionId: "Q1", awardedPoints: 10, maxPoints: 10 })]),
      exam("s2", [item({ questionId: "Q1", awardedPoints: 10, maxPoints: 20 })]),
    ]);
    expect(entries[0].stats.max_points).toBe(20);
    expect(entries[0].stats.avg_score_pct).toBe(50);
    expect(entries[0].stats.full_marks_count).toBe(0);
    expect(entries[0].stats.difficulty).toBe("Medium");
    expect(warnings).toEqual([
      "Q1: max_points 10 (exam s1) differs from 20 (exam s2); using the last value.",
    ]);
  });

  it("guards a zero maximum", () => {
    const { entries } = computeQuestionStats([exam("s1", [item({ questionId: "Q1", awardedPoints: 0, maxPoints: 0 })])]);
    expect(entries[0].stats.avg_score_pct).toBe(0);
    expect(entries[0].stats.difficulty).toBe("Hard");
    expect(entries[0].stats.full_marks_count).toBe(1);
  });

  it("returns nothing for no exams", () => {
    expect(computeQuestionStats([])).toEqual({ entries: [], warnings: [] });
  });
});
