type OpenAiFetchOptions = {
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
  onRetry?: (info: { attempt: number; status: number; delayMs: number; message: string }) => void;
};

export type OpenAiJsonResult =
  | { ok: true; status: number; json: Record<string, unknown> }
  | { ok: false; status: number; message: string; json: Record<string, unknown> };

const RETRYABLE_STATUS = new Set([408, 409, 429, 500, 502, 503, 504]);
const MAX_SUGGESTED_DELAY_MS = 120000;

function sleep(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function cleanKey(value: string) {
  return String(value || "").trim().replace(/^['"]|['"]$/g, "");
}

function asRecord(value: unknown): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) return {};
  return value as Record<string, unknown>;
}

export function resolveOpenAiApiKey(env: NodeJS.ProcessEnv = process.env) {
  const apiKey = cleanKey(String(env.OPENAI_API_KEY || ""));
  return { apiKey, keyType: apiKey ? ("standard" as const) : ("none" as const) };
}

/**
 * Delay the provider asked for, in ms. `retry-after-ms` wins over `retry-after`, which may be
 * seconds or an HTTP date.
 */
export function suggestedRetryDelayMs(headers: Headers, now: number = Date.now()): number | null {
  const ms = Number(headers.get("retry-after-ms"));
  if (headers.get("retry-after-ms") && Number.isFinite(ms) && ms >= 0) {
    return Math.min(MAX_SUGGESTED_DELAY_MS, ms);
  }
  const raw = String(headers.get("retry-after") || "").trim();
  if (!raw) return null;
  const seconds = Number(raw);
  if (Number.isFinite(seconds) && seconds >= 0) return Math.min(MAX_SUGGESTED_DELAY_MS, seconds * 1000);
  const at = Date.parse(raw);
  if (Number.isNaN(at)) return null;
  return Math.min(MAX_SUGGESTED_DELAY_MS, Math.max(0, at - now));
}

function errorMessageFrom(json: Record<string, unknown>, status: number) {
  const error = asRecord(json.error);
  return String(error.message || `OpenAI error (${status})`);
}

export async function fetchOpenAiJson(
  path: string,
  apiKey: string,
  init: {
    method?: "GET" | "POST";
    headers?: Record<string, string>;
    body?: string;
  } = {},
  options: OpenAiFetchOptions = {}
): Promise<OpenAiJsonResult> {
  const timeoutMs = Math.max(3000, Number(options.timeoutMs || 45000));
  const retries = Math.max(0, Number(options.retries ?? 2));
  const retryDelayMs = Math.max(150, Number(options.retryDelayMs || 500));
  const url = path.startsWith("http") ? path : `https://api.openai.com${path}`;

  let lastStatus = 0;
  let lastMessage = "OpenAI request failed.";

  for (let attempt = 0; attempt <= retries; attempt += 1) {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    let res: Response;
    try {
      res = await fetch(url, {
        method: init.method || "GET",
        headers: {
          Authorization: `Bearer ${apiKey}`,
          ...(init.headers || {}),
        },
        body: init.body,
        signal: controller.signal,
      });
    } catch (e) {
      clearTimeout(timer);
      const aborted = e instanceof Error && e.name === "AbortError";
      lastStatus = aborted ? 408 : 0;
      lastMessage = aborted ? "OpenAI request timed out." : e instanceof Error ? e.message : "OpenAI request failed.";
      if (attempt < retries) {
        const delayMs = retryDelayMs * Math.pow(2, attempt);
        options.onRetry?.({ attempt: attempt + 1, status: lastStatus, delayMs, message: lastMessage });
        await sleep(delayMs);
        continue;
      }
      return { ok: false, status: lastStatus, message: lastMessage, json: {} };
    }

    const text = await res.text().finally(() => clearTimeout(timer));
    let json: Record<string, unknown> = {};
    try {
      json = text ? asRecord(JSON.parse(text)) : {};
    } catch {
      // Non-JSON bodies (gateway pages) are reported through the status line below.
      json = {};
    }

    if (res.ok) {
      return { ok: true, status: res.status, json };
    }

    lastStatus = res.status;
    lastMessage = errorMessageFrom(json, res.status);
    if (attempt < retries && RETRYABLE_STATUS.has(res.status)) {
      const delayMs = suggestedRetryDelayMs(res.headers) ?? retryDelayMs * Math.pow(2, attempt);
      options.onRetry?.({ attempt: attempt + 1, status: res.status, delayMs, message: lastMessage });
      await sleep(delayMs);
      continue;
    }
    return { ok: false, status: res.status, message: lastMessage, json };
  }

  return { ok: false, status: lastStatus, message: lastMessage, json: {} };
}

/** Concatenated text of a Responses API payload. */
export function extractOutputText(responseJson: Record<string, unknown>): string {
  const direct = String(responseJson.output_text || "").trim();
  if (direct) return direct;
  const output = Array.isArray(responseJson.output) ? responseJson.output : [];
  const parts: string[] = [];
  for (const block of output) {
    const content = asRecord(block).content;
    for (const c of Array.isArray(content) ? content : []) {
      const row = asRecord(c);
      const txt = String(row.text || row.output_text || "").trim();
      if (txt) parts.push(txt);
    }
  }
  return parts.join("\n").trim();
}

export function supportsResponsesTemperature(model: string | null | undefined): boolean {
  const normalized = String(model || "").trim().toLowerCase();
  if (!normalized) return true;
  // GPT-5 and o-series Responses reject the temperature parameter.
  return !normalized.startsWith("gpt-5") && !/^o\d/.test(normalized);
}

export function buildResponsesTemperatureParam(
  model: string | null | undefined,
  temperature: number
): Record<string, number> {
  return supportsResponsesTemperature(model) ? { temperature } : {};
}
