import { validateExtraction, validateJudgments } from "@/lib/grading/judgmentValidation";
import { OracleError } from "@/lib/ops/errors";
import { buildExamTextPrompt, buildGradingPrompt, EXTRACTION_INSTRUCTIONS, GRADING_INSTRUCTIONS } from "./prompts";
import { requestJsonObject, type ResponsesCallContext } from "./responsesCall";
import type { GradingOracle, OracleInput, OracleJudgment } from "./types";

export function createTwoStageOracle(ctx: ResponsesCallContext): GradingOracle {
  return {
    mode: "two-stage",
    async judge(input: OracleInput): Promise<OracleJudgment> {
      const extractedPayload = await requestJsonObject(ctx, {
        op: "extract",
        examId: input.examId,
        instructions: EXTRACTION_INSTRUCTIONS,
        prompt: buildExamTextPrompt(input.examId, input.examText),
      });
      const extracted = validateExtraction(extractedPayload, input.examId);
      if (!extracted.ok) {
        throw new OracleError("PARSE", `Extraction output for ${input.examId} failed validation.`, {
          details: { stage: "extract", errors: extracted.errors },
        });
      }

      const gradedPayload = await requestJsonObject(ctx, {
        op: "grade",
        examId: input.examId,
        instructions: GRADING_INSTRUCTIONS,
        prompt: buildGradingPrompt({
          examId: input.examId,
          rubric: input.rubric,
          items: extracted.data,
          answerKey: input.answerKey,
        }),
      });
      const graded = validateJudgments(gradedPayload, {
        itemsKey: "items",
        expectedExamId: input.examId,
        studentAnswers: new Map(extracted.data.map((item) => [item.questionId, item.studentAnswer])),
      });
      if (!graded.ok) {
        throw new OracleError("PARSE", `Grading output for ${input.examId} failed validation.`, {
          details: { stage: "grade", errors: graded.errors },
        });
      }
      return { judgments: graded.data, extractedItems: extracted.data };
    },
  };
}
