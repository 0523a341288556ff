import { flagNumber, readFlags } from "@/lib/cli/args";
import { readOpenAiUsageHistory } from "@/lib/openai/usageLog";

function main() {
  const flags = readFlags(process.argv.slice(2));
  const days = Math.max(1, Math.floor(flagNumber(flags, "days") ?? 7));
  const history = readOpenAiUsageHistory(days);
  if (!history.available) {
    console.log("[usage] no usage recorded yet.");
    return;
  }
  console.log(`[usage] last ${days} day(s): ${history.totals.requests} request(s), ${history.totals.totalTokens} tokens`);
  for (const day of history.days) {
    console.log(`   ${day.date}  requests=${day.requests}  in=${day.inputTokens}  out=${day.outputTokens}`);
  }
  for (const [op, totals] of Object.entries(history.byOp)) {
    console.log(`   ${op.padEnd(12)} requests=${totals.requests}  tokens=${totals.totalTokens}`);
  }
}

main();
