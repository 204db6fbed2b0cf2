import type { RunState } from "./types.js";

/** Deterministic report for runs where no task produced a final report. */
export function incompleteReport(state: Pick<RunState, "query" | "plan" | "taskResults">): string {
  const tasks = state.plan?.tasks ?? [];
  const errors = state.taskResults.flatMap((output, i) =>
    output.error ? [`- Task ${i} (${tasks[i]?.action ?? "unknown"}): ${output.error}`] : [],
  );

  return [
    "# Research Incomplete",
    "",
    `**Query:** ${state.query}`,
    "",
    `No final report could be produced from ${state.taskResults.length} executed task(s).`,
    "",
    "**Task errors:**",
    ...(errors.length > 0 ? errors : ["- None recorded"]),
  ].join("\n");
}

/**
 * Copy the first non-empty `finalReport` in task order to `finalOutput`,
 * or the incomplete-research report when there is none. Always sets it.
 */
export function extractFinalOutput(state: RunState): string {
  let finalOutput: string | null = null;
  for (const output of state.taskResults) {
    if (output.kind === "finalize" && typeof output.finalReport === "string" && output.finalReport.trim()) {
      finalOutput = output.finalReport;
      break;
    }
  }
  state.finalOutput = finalOutput ?? incompleteReport(state);
  return state.finalOutput;
}
