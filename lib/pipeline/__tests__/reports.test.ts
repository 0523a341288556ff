import { describe, expect, it } from "vitest";
import { buildExamResult } from "@/lib/grading/reviewGate";
import { buildExamReport, buildItemBreakdown, formatPoints, reportFileName, toSummaryCsv } from "@/lib/pipeline/reports";

const result = buildExamResult("s1", [
  { questionId: "Q1", studentAnswer: "4", awardedPoints: 2, maxPoints: 2, verdict: "correct", confidence: 95, feedback: "" },
  { questionId: "Q2", studentAnswer: "x", awardedPoints: 0.5, maxPoints: 3, verdict: "partially_correct", confidence: 88, feedback: "Partly." },
]);

describe("formatPoints", () => {
  it("prints the shortest form", () => {
    expect(formatPoints(10)).toBe("10");
    expect(formatPoints(4.5)).toBe("4.5");
    expect(formatPoints(1 / 3)).toBe("0.333333");
    expect(formatPoints(0.1 + 0.2)).toBe("0.3");
  });
});

describe("exam report", () => {
  it("carries totals and per-question rows", () => {
    const report = buildExamReport(result, [
      { questionId: "Q1", questionText: "2+2?", studentAnswer: "4", transcriptionNotes: [] },
    ]);
    expect(reportFileName("s1")).toBe("s1_report.json");
    expect(() => reportFileName("analytics")).toThrow(
      "Exam id 'analytics' collides with analytics_report.json; rename the input file."
    );
    expect(report).toMatchObject({ exam_id: "s1", total_awarded: 2.5, total_max: 5, percentage: 50, flagged_count: 1 });
    expect(report.extracted_items).toEqual([
      { question_id: "Q1", question_text: "2+2?", student_answer: "4", transcription_notes: [] },
    ]);
    expect(report.graded_items[1]).toEqual({
      question_id: "Q2",
      student_answer: "x",
      awarded_points: 0.5,
      max_points: 3,
      verdict: "partially_correct",
      feedback: "Partly.",
      confidence: 88,
      flagged_for_review: true,
    });
  });

  it("lists items in exam order in the breakdown", () => {
    expect(buildItemBreakdown(result)).toBe("Q1:2/2; Q2:0.5/3");
  });
});

describe("toSummaryCsv", () => {
  it("quotes every cell and doubles embedded quotes", () => {
    const csv = toSummaryCsv([
      {
        exam_id: 'say "hi", ok',
        total_awarded: "1.00",
        total_max: "2.00",
        percentage: "50.00",
        flagged_count: "0",
        item_breakdown: "Q1:1/2",
      },
    ]);
    expect(csv.split("\n")[1]).toBe('"say ""hi"", ok","1.00","2.00","50.00","0","Q1:1/2"');
    expect(csv.endsWith("\n")).toBe(true);
  });

  it("writes only the header without rows", () => {
    expect(toSummaryCsv([])).toBe('"exam_id","total_awarded","total_max","percentage","flagged_count","item_breakdown"\n');
  });
});
