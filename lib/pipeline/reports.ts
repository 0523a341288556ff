import fs from "node:fs/promises";
import path from "node:path";
import { summarizeExam } from "@/lib/grading/examResult";
import { GradingError } from "@/lib/ops/errors";
import type { ExamResult, ExtractedItem } from "@/lib/grading/types";

export type ExamReport = {
  exam_id: string;
  total_awarded: number;
  total_max: number;
  percentage: number;
  flagged_count: number;
  extracted_items: Array<{
    question_id: string;
    question_text: string;
    student_answer: string;
    transcription_notes: string[];
  }>;
  graded_items: Array<{
    question_id: string;
    student_answer: string;
    awarded_points: number;
    max_points: number;
    verdict: string;
    feedback: string;
    confidence: number;
    flagged_for_review: boolean;
  }>;
};

export type ReviewQueueItem = {
  exam_id: string;
  question_id: string;
  awarded_points: number;
  max_points: number;
  verdict: string;
  confidence: number;
  feedback: string;
};

export type ReviewQueue = {
  total_flagged: number;
  items: ReviewQueueItem[];
};

export const SUMMARY_COLUMNS = [
  "exam_id",
  "total_awarded",
  "total_max",
  "percentage",
  "flagged_count",
  "item_breakdown",
] as const;

export type SummaryRow = Record<(typeof SUMMARY_COLUMNS)[number], string>;

export const REPORT_SUFFIX = "_report.json";
// Written next to the exam reports by the analytics run.
export const ANALYTICS_FILE = "analytics_report.json";

export function reportFileName(examId: string) {
  const name = `${examId}${REPORT_SUFFIX}`;
  if (name === ANALYTICS_FILE) {
    throw new GradingError("RESERVED_EXAM_ID", `Exam id '${examId}' collides with ${ANALYTICS_FILE}; rename the input file.`, {
      details: { examId },
    });
  }
  return name;
}

export function buildExamReport(result: ExamResult, extractedItems: ExtractedItem[]): ExamReport {
  const totals = summarizeExam(result);
  return {
    exam_id: result.examId,
    total_awarded: totals.totalAwarded,
    total_max: totals.totalMax,
    percentage: totals.percentage,
    flagged_count: totals.flaggedCount,
    extracted_items: extractedItems.map((item) => ({
      question_id: item.questionId,
      question_text: item.questionText,
      student_answer: item.studentAnswer,
      transcription_notes: item.transcriptionNotes,
    })),
    graded_items: result.items.map((item) => ({
      question_id: item.questionId,
      student_answer: item.studentAnswer,
      awarded_points: item.awardedPoints,
      max_points: item.maxPoints,
      verdict: item.verdict,
      feedback: item.feedback,
      confidence: item.confidence,
      flagged_for_review: item.flaggedForReview,
    })),
  };
}

export function buildReviewQueue(results: readonly ExamResult[]): ReviewQueue {
  const items = results.flatMap((result) =>
    summarizeExam(result).flaggedItems.map((item) => ({
      exam_id: result.examId,
      question_id: item.questionId,
      awarded_points: item.awardedPoints,
      max_points: item.maxPoints,
      verdict: item.verdict,
      confidence: item.confidence,
      feedback: item.feedback,
    }))
  );
  return { total_flagged: items.length, items };
}

// Shortest form, up to 6 significant digits: 10 -> "10", 4.5 -> "4.5".
export function formatPoints(value: number) {
  if (!Number.isFinite(value)) return String(value);
  return String(Number(value.toPrecision(6)));
}

export function buildItemBreakdown(result: ExamResult) {
  return result.items
    .map((item) => `${item.questionId}:${formatPoints(item.awardedPoints)}/${formatPoints(item.maxPoints)}`)
    .join("; ");
}

export function buildSummaryRow(result: ExamResult): SummaryRow {
  const totals = summarizeExam(result);
  return {
    exam_id: result.examId,
    total_awarded: totals.totalAwarded.toFixed(2),
    total_max: totals.totalMax.toFixed(2),
    percentage: totals.percentage.toFixed(2),
    flagged_count: String(totals.flaggedCount),
    item_breakdown: buildItemBreakdown(result),
  };
}

export function toSummaryCsv(rows: SummaryRow[]) {
  const esc = (v: string) => `"${String(v ?? "").replace(/"/g, '""')}"`;
  const lines = [
    SUMMARY_COLUMNS.map(esc).join(","),
    ...rows.map((row) => SUMMARY_COLUMNS.map((column) => esc(row[column])).join(",")),
  ];
  return `${lines.join("\n")}\n`;
}

export async function writeJsonFile(filePath: string, payload: unknown) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
}

export async function writeTextFile(filePath: string, text: string) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, text, "utf8");
}
