import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { QuestionJudgment } from "@/lib/grading/types";
import type { GradingOracle, OracleInput } from "@/lib/oracle";
import { OracleError } from "@/lib/ops/errors";
import { listExamInputs } from "@/lib/pipeline/inputs";
import { REVIEW_QUEUE_FILE, runGradingPipeline, SUMMARY_FILE } from "@/lib/pipeline/gradeExams";

function judgment(questionId: string, awardedPoints: number, maxPoints: number, overrides: Partial<QuestionJudgment> = {}): QuestionJudgment {
  return {
    questionId,
    studentAnswer: `answer ${questionId}`,
    awardedPoints,
    maxPoints,
    verdict: "correct",
    confidence: 95,
    feedback: "",
    ...overrides,
  };
}

const SCRIPTED: Record<string, QuestionJudgment[]> = {
  s1: [judgment("Q1", 2, 2), judgment("Q2", 1, 3, { verdict: "partially_correct", confidence: 90, feedback: "Missing steps." })],
  s3: [judgment("Q1", 1.5, 2, { confidence: 50 })],
};

function scriptedOracle(delays: Record<string, number> = {}): GradingOracle & { seen: OracleInput[] } {
  const seen: OracleInput[] = [];
  return {
    mode: "single-shot",
    seen,
    async judge(input) {
      seen.push(input);
      const delay = delays[input.examId] ?? 0;
      if (delay) await new Promise((resolve) => setTimeout(resolve, delay));
      const judgments = SCRIPTED[input.examId];
      if (!judgments) throw new OracleError("PARSE", `Grading output for ${input.examId} failed validation.`);
      return { judgments, extractedItems: [] };
    },
  };
}

describe("runGradingPipeline", () => {
  let root: string;
  let inputDir: string;
  let outputDir: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "grade-"));
    inputDir = path.join(root, "input");
    outputDir = path.join(root, "output");
    fs.mkdirSync(inputDir);
    for (const id of ["s1", "s2", "s3"]) fs.writeFileSync(path.join(inputDir, `${id}.txt`), `sheet of ${id}`);
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  async function run(oracle: GradingOracle, concurrency = 1) {
    return runGradingPipeline({
      runId: "run-1",
      inputs: await listExamInputs(inputDir),
      oracle,
      rubric: "Q1 2pts.",
      answerKey: null,
      confidenceThreshold: 80,
      concurrency,
      outputDir,
      logDir: root,
    });
  }

  it("isolates a failing exam and grades the rest", async () => {
    const oracle = scriptedOracle();
    const out = await run(oracle);

    expect(out.results.map((r) => r.examId)).toEqual(["s1", "s3"]);
    expect(out.failures).toEqual([
      { examId: "s2", code: "ORACLE_PARSE", kind: "PARSE", message: "Grading output for s2 failed validation." },
    ]);
    expect(oracle.seen.map((input) => input.examText)).toEqual(["sheet of s1", "sheet of s2", "sheet of s3"]);
    expect(fs.existsSync(path.join(outputDir, "s1_report.json"))).toBe(true);
    expect(fs.existsSync(path.join(outputDir, "s2_report.json"))).toBe(false);
  });

  it("writes the summary CSV in input order", async () => {
    const out = await run(scriptedOracle());

    expect(out.summaryPath).toBe(path.join(outputDir, SUMMARY_FILE));
    expect(fs.readFileSync(path.join(outputDir, SUMMARY_FILE), "utf8")).toBe(
      [
        '"exam_id","total_awarded","total_max","percentage","flagged_count","item_breakdown"',
        '"s1","3.00","5.00","60.00","1","Q1:2/2; Q2:1/3"',
        '"s3","1.50","2.00","75.00","1","Q1:1.5/2"',
        "",
      ].join("\n")
    );
  });

  it("collects flagged items into the review queue", async () => {
    const out = await run(scriptedOracle());

    expect(out.totalFlagged).toBe(2);
    expect(JSON.parse(fs.readFileSync(out.reviewQueuePath, "utf8"))).toEqual({
      total_flagged: 2,
      items: [
        { exam_id: "s1", question_id: "Q2", awarded_points: 1, max_points: 3, verdict: "partially_correct", confidence: 90, feedback: "Missing steps." },
        { exam_id: "s3", question_id: "Q1", awarded_points: 1.5, max_points: 2, verdict: "correct", confidence: 50, feedback: "" },
      ],
    });
  });

  it("keeps input order when later exams finish first", async () => {
    const out = await run(scriptedOracle({ s1: 30, s3: 0 }), 3);

    expect(out.results.map((r) => r.examId)).toEqual(["s1", "s3"]);
    const csv = fs.readFileSync(path.join(outputDir, SUMMARY_FILE), "utf8").split("\n");
    expect(csv[1].startsWith('"s1"')).toBe(true);
    expect(csv[2].startsWith('"s3"')).toBe(true);
  });

  it("refuses an exam whose report would overwrite the analytics output", async () => {
    fs.writeFileSync(path.join(inputDir, "analytics.txt"), "sheet");
    const oracle = scriptedOracle();
    const out = await run(oracle);

    expect(out.failures[0]).toEqual({
      examId: "analytics",
      code: "RESERVED_EXAM_ID",
      kind: null,
      message: "Exam id 'analytics' collides with analytics_report.json; rename the input file.",
    });
    expect(oracle.seen.map((input) => input.examId)).toEqual(["s1", "s2", "s3"]);
    expect(fs.existsSync(path.join(outputDir, "analytics_report.json"))).toBe(false);
  });

  it("writes an empty review queue and no CSV when every exam fails", async () => {
    const failing: GradingOracle = {
      mode: "two-stage",
      async judge() {
        throw new Error("socket hang up");
      },
    };
    const out = await run(failing);

    expect(out.results).toEqual([]);
    expect(out.failures.map((f) => [f.examId, f.code, f.kind])).toEqual([
      ["s1", "UNEXPECTED", null],
      ["s2", "UNEXPECTED", null],
      ["s3", "UNEXPECTED", null],
    ]);
    expect(out.summaryPath).toBeNull();
    expect(fs.existsSync(path.join(outputDir, SUMMARY_FILE))).toBe(false);
    expect(JSON.parse(fs.readFileSync(path.join(outputDir, REVIEW_QUEUE_FILE), "utf8"))).toEqual({
      total_flagged: 0,
      items: [],
    });
  });

  it("records one ops event per exam and one for the run", async () => {
    await run(scriptedOracle());

    const events = fs
      .readFileSync(path.join(root, ".ops-events.jsonl"), "utf8")
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line));
    expect(events.map((e) => [e.type, e.examId])).toEqual([
      ["EXAM_GRADED", "s1"],
      ["EXAM_FAILED", "s2"],
      ["EXAM_GRADED", "s3"],
      ["GRADING_RUN_DONE", null],
    ]);
    expect(events[3].details).toEqual({ mode: "single-shot", graded: 2, failed: 1, totalFlagged: 2 });
  });
});
