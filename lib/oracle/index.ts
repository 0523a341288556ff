import type { GradingConfig } from "@/lib/grading/config";
import { resolveOpenAiApiKey } from "@/lib/openai/client";
import { OracleError } from "@/lib/ops/errors";
import { createSingleShotOracle } from "./singleShot";
import { createTwoStageOracle } from "./twoStage";
import type { GradingOracle } from "./types";

export type { AnswerKey, GradingOracle, OracleInput, OracleJudgment } from "./types";

export function createGradingOracle(
  config: GradingConfig,
  options: { apiKey?: string; logDir?: string } = {}
): GradingOracle {
  const apiKey = options.apiKey ?? resolveOpenAiApiKey().apiKey;
  if (!apiKey) {
    throw new OracleError("CONFIG", "OPENAI_API_KEY is required to grade exams.");
  }
  const ctx = { apiKey, config, logDir: options.logDir };
  return config.mode === "two-stage" ? createTwoStageOracle(ctx) : createSingleShotOracle(ctx);
}
