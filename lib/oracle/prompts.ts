import type { ExtractedItem } from "@/lib/grading/types";
import type { AnswerKey } from "./types";

export const EXTRACTION_INSTRUCTIONS = [
  "You are the extraction step of an exam-grading pipeline.",
  "Transcribe the OCR text of one answer sheet into question/answer records.",
  "Rules:",
  "- Never grade or judge the answers.",
  "- Keep the student's wording; fix only obvious OCR artifacts.",
  "- If text is unreadable, keep a best-effort reading and say so in transcription_notes.",
  "- Return one JSON object only, no markdown.",
  'Schema: {"exam_id":"string","items":[{"question_id":"string","question_text":"string","student_answer":"string","transcription_notes":["string"]}]}',
].join("\n");

export const GRADING_INSTRUCTIONS = [
  "You are the grading step of an exam-grading pipeline. The answers were already transcribed.",
  "Rules:",
  "- Grade only against the rubric and the answer key given.",
  "- Do not improve, reinterpret or complete the student's answer.",
  "- Award points only for what is present in student_answer.",
  "- verdict is one of correct, partially_correct, incorrect.",
  "- confidence is 0-100: how sure you are of the awarded points.",
  "- Keep feedback short and specific.",
  "- Return one JSON object only, no markdown.",
  'Schema: {"exam_id":"string","items":[{"question_id":"string","awarded_points":0,"max_points":0,"verdict":"correct","confidence":0,"feedback":"string"}]}',
].join("\n");

export function buildSingleShotInstructions(rubric: string, answerKey?: AnswerKey | null) {
  const lines = [
    "You are an exam grader.",
    "Read the raw OCR text of one answer sheet, extract each answer and grade it.",
    "",
    "## Rubric",
    String(rubric || "").trim(),
  ];
  if (answerKey && Object.keys(answerKey).length) {
    lines.push("", "## Answer key (JSON)", JSON.stringify(answerKey, null, 2));
  }
  lines.push(
    "",
    "## Rules",
    "1) The input is raw OCR: correct typos and layout noise when extracting the answer.",
    "2) Grade strictly by the rubric above; do not invent criteria.",
    "3) verdict is one of correct, partially_correct, incorrect.",
    "4) confidence is 0-100: how sure you are of the awarded points.",
    "5) Return JSON matching the schema."
  );
  return lines.join("\n");
}

export function buildExamTextPrompt(examId: string, examText: string) {
  return [`exam_id: ${examId}`, "", "Raw OCR text:", String(examText || "").trim()].join("\n");
}

export function buildGradingPrompt(input: {
  examId: string;
  rubric: string;
  items: ExtractedItem[];
  answerKey?: AnswerKey | null;
}) {
  const payload = input.items.map((item) => ({
    question_id: item.questionId,
    question_text: item.questionText,
    student_answer: item.studentAnswer,
    transcription_notes: item.transcriptionNotes,
    answer_key: input.answerKey?.[item.questionId] ?? {},
  }));
  return [
    `exam_id: ${input.examId}`,
    "",
    "Rubric:",
    String(input.rubric || "").trim(),
    "",
    "Items to grade (JSON):",
    JSON.stringify(payload, null, 2),
  ].join("\n");
}

const questionSchema = {
  type: "object",
  additionalProperties: false,
  properties: {
    question_id: { type: "string", description: "Question id, e.g. Q1" },
    student_answer: { type: "string", description: "Extracted student answer" },
    awarded_points: { type: "number" },
    max_points: { type: "number" },
    verdict: { type: "string", enum: ["correct", "partially_correct", "incorrect"] },
    confidence: { type: "number", description: "0-100" },
    feedback: { type: "string" },
  },
  required: ["question_id", "student_answer", "awarded_points", "max_points", "verdict", "confidence", "feedback"],
} as const;

export const SINGLE_SHOT_SCHEMA = {
  type: "object",
  additionalProperties: false,
  properties: {
    exam_id: { type: "string" },
    questions: { type: "array", items: questionSchema },
  },
  required: ["exam_id", "questions"],
} as const;
