import { validateJudgments } from "@/lib/grading/judgmentValidation";
import { OracleError } from "@/lib/ops/errors";
import { buildExamTextPrompt, buildSingleShotInstructions, SINGLE_SHOT_SCHEMA } from "./prompts";
import { requestJsonObject, type ResponsesCallContext } from "./responsesCall";
import type { GradingOracle, OracleInput, OracleJudgment } from "./types";

export function createSingleShotOracle(ctx: ResponsesCallContext): GradingOracle {
  return {
    mode: "single-shot",
    async judge(input: OracleInput): Promise<OracleJudgment> {
      const payload = await requestJsonObject(ctx, {
        op: "single_shot",
        examId: input.examId,
        instructions: buildSingleShotInstructions(input.rubric, input.answerKey),
        prompt: buildExamTextPrompt(input.examId, input.examText),
        schema: { name: "exam_result", schema: SINGLE_SHOT_SCHEMA },
      });

      const checked = validateJudgments(payload, { itemsKey: "questions", expectedExamId: input.examId });
      if (!checked.ok) {
        throw new OracleError("PARSE", `Grading output for ${input.examId} failed validation.`, {
          details: { errors: checked.errors },
        });
      }
      return {
        judgments: checked.data,
        extractedItems: checked.data.map((row) => ({
          questionId: row.questionId,
          questionText: "",
          studentAnswer: row.studentAnswer,
          transcriptionNotes: ["Extracted in single-shot mode"],
        })),
      };
    },
  };
}
