import type { Task } from "../planner/types.js";
import { parseReferences, resolveUrl } from "./references.js";
import { totalTasks } from "./run-state.js";
import type { RunState, RunStateView, StepName } from "./types.js";

/**
 * Percentage complete after `step`. Planning and finalizing count as one
 * step each, tasks in between; the finalize step always reports 100.
 */
export function computeProgress(state: Pick<RunState, "plan" | "currentTaskIndex">, step: StepName): number {
  const tasks = totalTasks(state);
  const total = tasks + 2;
  const completed =
    step === "planner" ? 1 : step === "task_executor" ? 1 + Math.min(state.currentTaskIndex, tasks) : total;
  return Math.min(100, (100 * completed) / total);
}

function refList(task: Task): string {
  return parseReferences(task.fromTask)
    .map((r) => (r.index === null ? r.raw : String(r.index)))
    .join(", ");
}

/** Human-readable label for a task, as shown while it runs. */
export function describeTask(state: Pick<RunStateView, "taskResults">, task: Task): string {
  if (task.description) return task.description;

  const refs = refList(task);
  switch (task.action) {
    case "search":
      if (task.query) return `Searching for: ${task.query}`;
      break;
    case "scrape": {
      const url = task.query ?? resolveUrl(state.taskResults, task);
      if (url) return `Scraping product page: ${url}`;
      break;
    }
    case "summarize":
      if (refs) return `Summarizing results of task ${refs}`;
      break;
    case "sentiment":
      if (refs) return `Analyzing sentiment of task ${refs}`;
      break;
    case "compare":
      if (refs) return `Comparing products from tasks ${refs}`;
      break;
    case "finalize":
      return "Synthesizing final report...";
  }
  return `Running ${task.action} task...`;
}

/** Description for a step event; task steps describe the task just attempted. */
export function describeStep(state: RunState, step: StepName): string {
  switch (step) {
    case "planner": {
      const n = totalTasks(state);
      return `Created research plan with ${n} task${n === 1 ? "" : "s"}`;
    }
    case "task_executor": {
      const task = state.plan?.tasks[state.currentTaskIndex - 1];
      return task ? describeTask(state, task) : "Executing tasks...";
    }
    case "finalize":
      return state.phase === "cancelled" ? "Research cancelled" : "Research complete";
  }
}
