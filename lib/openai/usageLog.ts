import fs from "node:fs";
import path from "node:path";

export type UsageOp = "extract" | "grade" | "single_shot";

type UsageLogEvent = {
  ts: number;
  model: string;
  op: string;
  examId: string | null;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
};

export type UsageTotals = {
  requests: number;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
};

export type UsageHistory = {
  available: boolean;
  totals: UsageTotals;
  days: Array<{ date: string } & UsageTotals>;
  byOp: Record<string, UsageTotals>;
};

export function resolveUsageLogPath(cwd: string = process.cwd()) {
  return path.join(cwd, ".openai-usage-log.jsonl");
}

function toInt(value: unknown): number {
  const n = typeof value === "number" ? value : Number(value);
  return Number.isFinite(n) ? Math.max(0, Math.floor(n)) : 0;
}

function dayKeyFromTs(ts: number): string {
  return new Date(ts * 1000).toISOString().slice(0, 10);
}

function emptyTotals(): UsageTotals {
  return { requests: 0, inputTokens: 0, outputTokens: 0, totalTokens: 0 };
}

function addTo(totals: UsageTotals, row: UsageLogEvent) {
  totals.requests += 1;
  totals.inputTokens += toInt(row.inputTokens);
  totals.outputTokens += toInt(row.outputTokens);
  totals.totalTokens += toInt(row.totalTokens);
}

function parseLine(line: string): UsageLogEvent | null {
  try {
    const row: unknown = JSON.parse(line);
    if (!row || typeof row !== "object") return null;
    const rec = row as Record<string, unknown>;
    const ts = Number(rec.ts);
    if (!Number.isFinite(ts)) return null;
    return {
      ts,
      model: String(rec.model || "unknown"),
      op: String(rec.op || "unknown"),
      examId: rec.examId ? String(rec.examId) : null,
      inputTokens: toInt(rec.inputTokens),
      outputTokens: toInt(rec.outputTokens),
      totalTokens: toInt(rec.totalTokens),
    };
  } catch {
    // partially written line
    return null;
  }
}

export function recordOpenAiUsage(
  input: { model: string; op: UsageOp; examId?: string | null; usage: unknown },
  cwd?: string
) {
  const usage = (input.usage && typeof input.usage === "object" ? input.usage : {}) as Record<string, unknown>;
  const inputTokens = toInt(usage.input_tokens ?? usage.prompt_tokens);
  const outputTokens = toInt(usage.output_tokens ?? usage.completion_tokens);
  const totalTokens = toInt(usage.total_tokens) || inputTokens + outputTokens;
  const event: UsageLogEvent = {
    ts: Math.floor(Date.now() / 1000),
    model: String(input.model || "unknown"),
    op: input.op,
    examId: input.examId || null,
    inputTokens,
    outputTokens,
    totalTokens,
  };
  try {
    fs.appendFileSync(resolveUsageLogPath(cwd), `${JSON.stringify(event)}\n`, { encoding: "utf8" });
  } catch (e) {
    console.warn(`[usage] could not record ${event.op} usage: ${e instanceof Error ? e.message : String(e)}`);
  }
  return event;
}

export function readOpenAiUsageHistory(days: number, options: { cwd?: string; now?: number } = {}): UsageHistory {
  const now = Math.floor((options.now ?? Date.now()) / 1000);
  const start = now - Math.max(1, days) * 24 * 60 * 60;
  const totals = emptyTotals();
  const byDay = new Map<string, UsageTotals>();
  const byOp: Record<string, UsageTotals> = {};
  const logFile = resolveUsageLogPath(options.cwd);

  if (!fs.existsSync(logFile)) {
    return { available: false, totals, days: [], byOp };
  }

  const lines = fs
    .readFileSync(logFile, "utf8")
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
  for (const line of lines) {
    const row = parseLine(line);
    if (!row || row.ts < start) continue;

    addTo(totals, row);
    const key = dayKeyFromTs(row.ts);
    const day = byDay.get(key) || emptyTotals();
    addTo(day, row);
    byDay.set(key, day);
    byOp[row.op] = byOp[row.op] || emptyTotals();
    addTo(byOp[row.op], row);
  }

  const daysOut = Array.from(byDay.entries())
    .sort((a, b) => a[0].localeCompare(b[0]))
    .map(([date, agg]) => ({ date, ...agg }));

  return { available: true, totals, days: daysOut, byOp };
}
