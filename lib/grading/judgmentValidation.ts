import type { ExtractedItem, QuestionJudgment, Verdict } from "./types";
import { isVerdict } from "./types";

export type ValidationResult<T> = { ok: true; data: T } | { ok: false; errors: string[] };

type RawRecord = Record<string, unknown>;

function asRecord(input: unknown): RawRecord {
  return input && typeof input === "object" && !Array.isArray(input) ? (input as RawRecord) : {};
}

export function normalizeText(input: unknown) {
  return String(input ?? "")
    .replace(/\u00A0/g, " ")
    .replace(/[ \t]+\n/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function normalizeVerdict(input: unknown): Verdict | null {
  const raw = String(input ?? "")
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, "_");
  if (isVerdict(raw)) return raw;
  if (raw === "partial" || raw === "partly_correct" || raw === "partial_credit") return "partially_correct";
  if (raw === "wrong" || raw === "not_correct") return "incorrect";
  return null;
}

function readNumber(input: unknown): number {
  if (typeof input === "number") return input;
  if (typeof input === "string" && input.trim()) return Number(input);
  return NaN;
}

function normalizeConfidence(input: unknown): number {
  if (input === undefined || input === null || input === "") return 100;
  const n = readNumber(input);
  if (!Number.isFinite(n)) return NaN;
  return Math.max(0, Math.min(100, n));
}

function readItems(payload: RawRecord, keys: string[], errors: string[]): unknown[] {
  for (const key of keys) {
    const value = payload[key];
    if (Array.isArray(value)) return value;
  }
  errors.push(`Expected a list at key '${keys[0]}'.`);
  return [];
}

function checkExamId(payload: RawRecord, expectedExamId: string | undefined, errors: string[]) {
  const examId = normalizeText(payload.exam_id);
  if (!examId) {
    if (!expectedExamId) errors.push("exam_id is required.");
    return;
  }
  if (expectedExamId && examId !== expectedExamId) {
    errors.push(`exam_id '${examId}' does not match the graded exam '${expectedExamId}'.`);
  }
}

/**
 * Validates one oracle grading payload. Rows are keyed by `question_id`; a question graded
 * twice is an error rather than last-write-wins, since the exam total would double count.
 */
export function validateJudgments(
  input: unknown,
  options: { itemsKey?: "items" | "questions"; expectedExamId?: string; studentAnswers?: Map<string, string> } = {}
): ValidationResult<QuestionJudgment[]> {
  const errors: string[] = [];
  const payload = asRecord(input);
  checkExamId(payload, options.expectedExamId, errors);

  const keys = options.itemsKey === "questions" ? ["questions", "items"] : ["items", "questions"];
  const rows = readItems(payload, keys, errors);

  const judgments: QuestionJudgment[] = [];
  const seen = new Set<string>();
  rows.forEach((rawRow, index) => {
    const row = asRecord(rawRow);
    const questionId = normalizeText(row.question_id);
    const label = questionId || `#${index}`;
    if (!questionId) {
      errors.push(`items[${index}].question_id is required.`);
      return;
    }
    if (seen.has(questionId)) {
      errors.push(`items contains duplicate question_id: ${questionId}.`);
      return;
    }
    seen.add(questionId);

    const verdict = normalizeVerdict(row.verdict);
    const awardedPoints = readNumber(row.awarded_points);
    const maxPoints = readNumber(row.max_points);
    const confidence = normalizeConfidence(row.confidence);

    if (!verdict) {
      errors.push(`items[${label}].verdict must be correct/partially_correct/incorrect (got '${String(row.verdict ?? "")}').`);
    }
    if (!Number.isFinite(maxPoints) || maxPoints < 0) {
      errors.push(`items[${label}].max_points must be a non-negative number.`);
    }
    if (!Number.isFinite(awardedPoints) || awardedPoints < 0) {
      errors.push(`items[${label}].awarded_points must be a non-negative number.`);
    } else if (Number.isFinite(maxPoints) && awardedPoints > maxPoints) {
      errors.push(`items[${label}].awarded_points (${awardedPoints}) exceeds max_points (${maxPoints}).`);
    }
    if (!Number.isFinite(confidence)) {
      errors.push(`items[${label}].confidence must be a number between 0 and 100.`);
    }
    if (!verdict) return;

    judgments.push({
      questionId,
      studentAnswer: normalizeText(row.student_answer) || options.studentAnswers?.get(questionId) || "",
      awardedPoints,
      maxPoints,
      verdict,
      confidence,
      feedback: normalizeText(row.feedback),
    });
  });

  if (errors.length) return { ok: false, errors };
  return { ok: true, data: judgments };
}

export function validateExtraction(input: unknown, expectedExamId?: string): ValidationResult<ExtractedItem[]> {
  const errors: string[] = [];
  const payload = asRecord(input);
  checkExamId(payload, expectedExamId, errors);
  const rows = readItems(payload, ["items"], errors);

  const items: ExtractedItem[] = [];
  const seen = new Set<string>();
  rows.forEach((rawRow, index) => {
    const row = asRecord(rawRow);
    const questionId = normalizeText(row.question_id);
    if (!questionId) {
      errors.push(`items[${index}].question_id is required.`);
      return;
    }
    if (seen.has(questionId)) {
      errors.push(`items contains duplicate question_id: ${questionId}.`);
      return;
    }
    seen.add(questionId);
    const notes = Array.isArray(row.transcription_notes) ? row.transcription_notes : [];
    items.push({
      questionId,
      questionText: normalizeText(row.question_text),
      studentAnswer: normalizeText(row.student_answer),
      transcriptionNotes: notes.map((note) => normalizeText(note)).filter(Boolean),
    });
  });

  if (errors.length) return { ok: false, errors };
  return { ok: true, data: items };
}
