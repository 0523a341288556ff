import { promises as fs } from "node:fs";
import path from "node:path";

export type OpsEventType = "EXAM_GRADED" | "EXAM_FAILED" | "GRADING_RUN_DONE" | "ANALYTICS_RUN_DONE";

type OpsEvent = {
  ts?: string;
  type: OpsEventType;
  runId: string;
  examId?: string | null;
  details?: Record<string, unknown>;
};

export function resolveLogPath(cwd: string = process.cwd()) {
  return path.join(cwd, ".ops-events.jsonl");
}

export async function appendOpsEvent(event: OpsEvent, cwd?: string) {
  const payload = {
    ts: event.ts || new Date().toISOString(),
    type: event.type,
    runId: event.runId,
    examId: event.examId || null,
    details: event.details || {},
  };
  try {
    await fs.appendFile(resolveLogPath(cwd), `${JSON.stringify(payload)}\n`, "utf8");
  } catch (e) {
    console.warn(`[ops] could not record ${payload.type}: ${e instanceof Error ? e.message : String(e)}`);
  }
}
