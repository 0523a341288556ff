import fs from "node:fs";
import path from "node:path";
import { DEFAULT_CONFIDENCE_THRESHOLD, normalizeConfidenceThreshold } from "@/lib/grading/reviewGate";

const DEFAULT_MODEL = "gpt-4.1-mini";

export type GradingMode = "single-shot" | "two-stage";

export type GradingConfig = {
  model: string;
  mode: GradingMode;
  confidenceThreshold: number;
  concurrency: number;
  retries: number;
  retryDelayMs: number;
  timeoutMs: number;
  maxOutputTokens: number;
  updatedAt: string;
};

export type GradingConfigSource = "default" | "settings";

export function resolveConfigPath(cwd: string = process.cwd()) {
  return path.join(cwd, ".grading-config.json");
}

export function defaultGradingConfig(): GradingConfig {
  return {
    model: DEFAULT_MODEL,
    mode: "single-shot",
    confidenceThreshold: DEFAULT_CONFIDENCE_THRESHOLD,
    concurrency: 1,
    retries: 3,
    retryDelayMs: 1000,
    timeoutMs: 60000,
    maxOutputTokens: 2200,
    updatedAt: new Date().toISOString(),
  };
}

export function normalizeMode(v: unknown): GradingMode {
  const x = String(v || "")
    .trim()
    .toLowerCase()
    .replace(/[_\s]+/g, "-");
  if (x === "two-stage" || x === "twostage") return "two-stage";
  return "single-shot";
}

function normalizeModel(v: unknown): string {
  const model = String(v || "").trim();
  return model || DEFAULT_MODEL;
}

function normalizeInt(v: unknown, fallback: number, min: number, max: number): number {
  if (v === null || v === undefined || v === "") return fallback;
  const n = Number(v);
  if (!Number.isFinite(n)) return fallback;
  return Math.max(min, Math.min(max, Math.round(n)));
}

export function normalizeConfig(input: Partial<Record<keyof GradingConfig, unknown>>): GradingConfig {
  const base = defaultGradingConfig();
  return {
    model: normalizeModel(input.model ?? base.model),
    mode: normalizeMode(input.mode ?? base.mode),
    confidenceThreshold: normalizeConfidenceThreshold(input.confidenceThreshold ?? base.confidenceThreshold),
    concurrency: normalizeInt(input.concurrency, base.concurrency, 1, 16),
    retries: normalizeInt(input.retries, base.retries, 0, 8),
    retryDelayMs: normalizeInt(input.retryDelayMs, base.retryDelayMs, 150, 120000),
    timeoutMs: normalizeInt(input.timeoutMs, base.timeoutMs, 3000, 600000),
    maxOutputTokens: normalizeInt(input.maxOutputTokens, base.maxOutputTokens, 256, 32000),
    updatedAt: new Date().toISOString(),
  };
}

function readEnvOverrides(env: NodeJS.ProcessEnv): Partial<Record<keyof GradingConfig, unknown>> {
  const pick = (name: string) => {
    const raw = String(env[name] ?? "").trim();
    return raw ? raw : undefined;
  };
  const out: Partial<Record<keyof GradingConfig, unknown>> = {
    model: pick("OPENAI_GRADING_MODEL"),
    mode: pick("GRADING_MODE"),
    confidenceThreshold: pick("GRADING_CONFIDENCE_THRESHOLD"),
    concurrency: pick("GRADING_CONCURRENCY"),
    retries: pick("OPENAI_GRADING_RETRIES"),
    retryDelayMs: pick("OPENAI_GRADING_RETRY_DELAY_MS"),
    timeoutMs: pick("OPENAI_GRADING_TIMEOUT_MS"),
    maxOutputTokens: pick("OPENAI_GRADING_MAX_OUTPUT_TOKENS"),
  };
  return Object.fromEntries(Object.entries(out).filter(([, value]) => value !== undefined));
}

function readSettingsFile(filePath: string): Partial<Record<keyof GradingConfig, unknown>> | null {
  if (!fs.existsSync(filePath)) return null;
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
    if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) return null;
    return parsed as Partial<Record<keyof GradingConfig, unknown>>;
  } catch (e) {
    console.warn(`[config] ignoring unreadable ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
    return null;
  }
}

/**
 * Layers: defaults, then `.grading-config.json`, then environment, then explicit overrides
 * (CLI flags). Every layer goes through the same normalization.
 */
export function readGradingConfig(
  options: {
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    overrides?: Partial<Record<keyof GradingConfig, unknown>>;
  } = {}
): { config: GradingConfig; source: GradingConfigSource } {
  const settings = readSettingsFile(resolveConfigPath(options.cwd));
  const env = readEnvOverrides(options.env ?? process.env);
  const overrides = Object.fromEntries(
    Object.entries(options.overrides || {}).filter(([, value]) => value !== undefined)
  );
  const config = normalizeConfig({ ...(settings || {}), ...env, ...overrides });
  return { config, source: settings ? "settings" : "default" };
}

export function writeGradingConfig(next: Partial<GradingConfig>, cwd?: string) {
  const filePath = resolveConfigPath(cwd);
  const prev = readSettingsFile(filePath) || {};
  const merged = normalizeConfig({ ...prev, ...next });
  fs.writeFileSync(filePath, JSON.stringify(merged, null, 2), "utf8");
  return merged;
}
