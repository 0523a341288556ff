import type { GradingMode } from "@/lib/grading/config";
import type { ExtractedItem, QuestionJudgment } from "@/lib/grading/types";

export type AnswerKey = Record<string, Record<string, unknown>>;

export type OracleInput = {
  examId: string;
  examText: string;
  rubric: string;
  answerKey?: AnswerKey | null;
};

export type OracleJudgment = {
  judgments: QuestionJudgment[];
  extractedItems: ExtractedItem[];
};

/** One capability, two interchangeable implementations picked from config. */
export interface GradingOracle {
  readonly mode: GradingMode;
  judge(input: OracleInput): Promise<OracleJudgment>;
}
