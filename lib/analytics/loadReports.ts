import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ANALYTICS_FILE, REPORT_SUFFIX } from "@/lib/pipeline/reports";
import { compareIds } from "./rounding";
import type { DataQuality, ReportedExam, ReportedItem } from "./types";

const reportSchema = z.object({
  exam_id: z.string().trim().min(1),
  graded_items: z.array(z.unknown()),
});

const reportItemSchema = z
  .object({
    question_id: z.string().trim().min(1),
    awarded_points: z.number().finite().nonnegative(),
    max_points: z.number().finite().nonnegative(),
    verdict: z.string(),
    confidence: z.number().finite().nullish(),
    feedback: z.string().nullish(),
  })
  .refine((item) => item.awarded_points <= item.max_points, {
    message: "awarded_points exceeds max_points",
    path: ["awarded_points"],
  });

function describeIssues(error: z.ZodError) {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export type LoadedReports = {
  exams: ReportedExam[];
  quality: DataQuality;
};

/**
 * Reads every `*_report.json` in `dir` except the analytics output, in file-name order.
 * Malformed files and items are skipped and listed in `quality`; nothing here throws on bad data.
 */
export async function loadReports(dir: string): Promise<LoadedReports> {
  const quality: DataQuality = { skipped_files: [], skipped_items: [], warnings: [] };

  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") {
      quality.warnings.push(`Report directory ${dir} does not exist.`);
      return { exams: [], quality };
    }
    throw e;
  }

  const files = names.filter((name) => name.endsWith(REPORT_SUFFIX) && name !== ANALYTICS_FILE).sort(compareIds);
  const exams: ReportedExam[] = [];
  const seenExamIds = new Map<string, string>();

  for (const file of files) {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(path.join(dir, file), "utf8"));
    } catch (e) {
      quality.skipped_files.push({ file, reason: `not readable JSON (${e instanceof Error ? e.message : String(e)})` });
      continue;
    }

    const report = reportSchema.safeParse(raw);
    if (!report.success) {
      quality.skipped_files.push({ file, reason: describeIssues(report.error) });
      continue;
    }

    const examId = report.data.exam_id;
    const previous = seenExamIds.get(examId);
    if (previous) {
      quality.warnings.push(`exam_id ${examId} appears in both ${previous} and ${file}; both are counted.`);
    }
    seenExamIds.set(examId, file);

    const items: ReportedItem[] = [];
    report.data.graded_items.forEach((rawItem, index) => {
      const parsed = reportItemSchema.safeParse(rawItem);
      if (!parsed.success) {
        quality.skipped_items.push({ file, index, reason: describeIssues(parsed.error) });
        return;
      }
      const item = parsed.data;
      items.push(
        Object.freeze({
          questionId: item.question_id,
          awardedPoints: item.awarded_points,
          maxPoints: item.max_points,
          verdict: item.verdict.trim(),
          confidence: item.confidence ?? 100,
          feedback: item.feedback ?? "",
        })
      );
    });

    if (!items.length && report.data.graded_items.length) {
      quality.warnings.push(`${file}: every graded item was skipped; the exam counts with a score of 0.`);
    }
    exams.push(Object.freeze({ examId, items: Object.freeze(items) }));
  }

  return { exams, quality };
}
