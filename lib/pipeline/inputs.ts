import fs from "node:fs/promises";
import path from "node:path";
import { GradingError } from "@/lib/ops/errors";
import type { AnswerKey } from "@/lib/oracle";

export type ExamInput = {
  examId: string;
  filePath: string;
};

export function examIdFromPath(filePath: string) {
  const base = path.basename(filePath);
  const ext = path.extname(base);
  return ext ? base.slice(0, -ext.length) : base;
}

export async function listExamInputs(inputDir: string, suffix = ".txt"): Promise<ExamInput[]> {
  let names: string[];
  try {
    names = await fs.readdir(inputDir);
  } catch (e) {
    throw new GradingError("INPUT_DIR_UNREADABLE", `Cannot read input directory ${inputDir}.`, { cause: e });
  }
  const wanted = suffix.toLowerCase();
  const inputs = names
    .filter((name) => name.toLowerCase().endsWith(wanted))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((name) => {
      const filePath = path.join(inputDir, name);
      return { examId: examIdFromPath(filePath), filePath };
    });
  if (!inputs.length) {
    throw new GradingError("NO_INPUTS", `No files matched '*${suffix}' in directory ${inputDir}.`, {
      details: { inputDir, suffix },
    });
  }
  return inputs;
}

export async function loadRubric(filePath: string): Promise<string> {
  try {
    return (await fs.readFile(filePath, "utf8")).trim();
  } catch (e) {
    throw new GradingError("RUBRIC_UNREADABLE", `Cannot read rubric ${filePath}.`, { cause: e });
  }
}

/** A missing answer key file means "grade by rubric only". */
export async function loadAnswerKey(filePath: string | null | undefined): Promise<AnswerKey | null> {
  if (!filePath) return null;
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return null;
    throw new GradingError("ANSWER_KEY_UNREADABLE", `Cannot read answer key ${filePath}.`, { cause: e });
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new GradingError("ANSWER_KEY_INVALID", `Answer key ${filePath} is not valid JSON.`, { cause: e });
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new GradingError("ANSWER_KEY_INVALID", `Answer key ${filePath} must be an object keyed by question id.`);
  }
  const out: AnswerKey = {};
  const entries: Array<[string, unknown]> = Object.entries(parsed);
  for (const [questionId, entry] of entries) {
    const key = questionId.trim();
    if (!key) continue;
    out[key] = entry && typeof entry === "object" && !Array.isArray(entry) ? { ...entry } : { answer: entry };
  }
  return out;
}
