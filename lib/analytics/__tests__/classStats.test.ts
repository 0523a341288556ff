import { describe, expect, it } from "vitest";
import { computeClassStats } from "@/lib/analytics/classStats";
import { exam, item } from "./fixtures";

describe("computeClassStats", () => {
  it("returns the empty sentinel for no exams", () => {
    expect(computeClassStats([])).toEqual({ stats: { total_students: 0 }, warnings: [] });
  });

  it("summarizes exam percentages and totals", () => {
    const { stats, warnings } = computeClassStats([
      exam("s1", [item({ questionId: "Q1", awardedPoints: 10 }), item({ questionId: "Q2", awardedPoints: 4 })]),
      exam("s2", [item({ questionId: "Q1", awardedPoints: 5 }), item({ questionId: "Q2", awardedPoints: 0 })]),
      exam("s3", [item({ questionId: "Q1", awardedPoints: 10 }), item({ questionId: "Q2", awardedPoints: 10 })]),
    ]);
    expect(warnings).toEqual([]);
    expect(stats).toEqual({
      total_students: 3,
      class_average_pct: 65,
      highest_score: 100,
      lowest_score: 25,
      total_possible: 20,
      avg_total_awarded: 13,
    });
  });

  it("takes total_possible from the first exam and warns on a mismatch", () => {
    const { stats, warnings } = computeClassStats([
      exam("s1", [item({ questionId: "Q1", awardedPoints: 5, maxPoints: 10 })]),
      exam("s2", [item({ questionId: "Q1", awardedPoints: 6, maxPoints: 12 })]),
    ]);
    expect(stats).toMatchObject({ total_possible: 10, class_average_pct: 50 });
    expect(warnings).toEqual(["total_max differs across exams: s2=12 vs s1=10; total_possible uses s1."]);
  });

  it("counts an exam with no items as 0%", () => {
    const { stats } = computeClassStats([exam("s1", []), exam("s2", [item({ questionId: "Q1" })])]);
    expect(stats).toMatchObject({ total_students: 2, class_average_pct: 50, lowest_score: 0, total_possible: 0 });
  });
});
