import type { GradingConfig } from "@/lib/grading/config";
import { buildResponsesTemperatureParam, extractOutputText, fetchOpenAiJson } from "@/lib/openai/client";
import { recordOpenAiUsage, type UsageOp } from "@/lib/openai/usageLog";
import { OracleError } from "@/lib/ops/errors";
import { parseJsonObject } from "./parseJson";

export type ResponsesCallContext = {
  apiKey: string;
  config: GradingConfig;
  // Directory for the usage log; defaults to the working directory.
  logDir?: string;
};

export async function requestJsonObject(
  ctx: ResponsesCallContext,
  call: {
    op: UsageOp;
    examId: string;
    instructions: string;
    prompt: string;
    schema?: { name: string; schema: Record<string, unknown> };
  }
): Promise<Record<string, unknown>> {
  const { config } = ctx;
  const body = {
    model: config.model,
    ...buildResponsesTemperatureParam(config.model, 0),
    max_output_tokens: config.maxOutputTokens,
    instructions: call.instructions,
    input: [{ role: "user", content: [{ type: "input_text", text: call.prompt }] }],
    text: {
      format: call.schema
        ? { type: "json_schema", name: call.schema.name, schema: call.schema.schema, strict: true }
        : { type: "json_object" },
    },
  };

  const res = await fetchOpenAiJson(
    "/v1/responses",
    ctx.apiKey,
    {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    },
    {
      timeoutMs: config.timeoutMs,
      retries: config.retries,
      retryDelayMs: config.retryDelayMs,
      onRetry: ({ attempt, status, delayMs }) =>
        console.warn(`[oracle] ${call.examId} ${call.op}: retry ${attempt}/${config.retries} after ${status || "network"} in ${delayMs}ms`),
    }
  );
  if (!res.ok) {
    throw new OracleError("REQUEST", `${call.op} request failed for ${call.examId}: ${res.message}`, {
      status: res.status,
      details: { op: call.op, examId: call.examId },
    });
  }

  recordOpenAiUsage({ model: config.model, op: call.op, examId: call.examId, usage: res.json.usage }, ctx.logDir);

  const text = extractOutputText(res.json);
  const parsed = parseJsonObject(text);
  if (!parsed) {
    throw new OracleError("PARSE", `${call.op} output for ${call.examId} is not a JSON object.`, {
      details: { op: call.op, examId: call.examId, snippet: text.slice(0, 400) },
    });
  }
  return parsed;
}
