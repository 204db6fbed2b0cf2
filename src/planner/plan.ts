import { parseReferences } from "../engine/references.js";
import type { OrderViolation, Plan, PlanInput, Task } from "./types.js";

const URL_PATTERN = /https?:\/\/\S+/;

export const FALLBACK_REASONING = "Fallback plan (LLM unavailable)";

function freezeTask(task: PlanInput["tasks"][number]): Task {
  const frozen: Task = {
    action: task.action,
    query: task.query,
    fromTask: task.fromTask,
    urlIndex: task.urlIndex ?? 0,
    description: task.description,
  };
  return Object.freeze(frozen);
}

/** Build an immutable plan. Task order is execution order. */
export function createPlan(input: PlanInput): Plan {
  const plan: Plan = {
    intent: input.intent,
    tasks: Object.freeze(input.tasks.map(freezeTask)),
    reasoning: input.reasoning,
  };
  return Object.freeze(plan);
}

/** First URL-shaped substring of a query, if any. */
export function findUrl(text: string): string | null {
  return text.match(URL_PATTERN)?.[0] ?? null;
}

/**
 * Deterministic plan used when the planner is unavailable. A query with a URL
 * is scraped directly; anything else is searched first.
 */
export function fallbackPlan(query: string): Plan {
  if (findUrl(query)) {
    return createPlan({
      intent: "product_analysis",
      reasoning: FALLBACK_REASONING,
      tasks: [
        { action: "scrape", query },
        { action: "summarize", fromTask: "task:0" },
        { action: "sentiment", fromTask: "task:0" },
        { action: "finalize" },
      ],
    });
  }

  return createPlan({
    intent: "product_research",
    reasoning: FALLBACK_REASONING,
    tasks: [
      { action: "search", query },
      { action: "scrape", fromTask: "task:0" },
      { action: "summarize", fromTask: "task:1" },
      { action: "sentiment", fromTask: "task:1" },
      { action: "finalize" },
    ],
  });
}

/**
 * List references that don't point strictly backwards. Sequential execution
 * only sees results of earlier tasks, so anything else resolves to empty.
 */
export function checkPlanOrder(plan: Plan): OrderViolation[] {
  const violations: OrderViolation[] = [];
  plan.tasks.forEach((task, taskIndex) => {
    for (const ref of parseReferences(task.fromTask)) {
      if (ref.index === null) {
        violations.push({ taskIndex, reference: ref.raw, reason: "malformed" });
      } else if (ref.index === taskIndex) {
        violations.push({ taskIndex, reference: ref.raw, reason: "self" });
      } else if (ref.index > taskIndex) {
        violations.push({ taskIndex, reference: ref.raw, reason: "forward" });
      }
    }
  });
  return violations;
}

/** Actions used by a plan, in order, for summaries. */
export function planSummary(plan: Plan): { intent: string; totalTasks: number; taskTypes: string[] } {
  return {
    intent: plan.intent,
    totalTasks: plan.tasks.length,
    taskTypes: plan.tasks.map((t) => t.action),
  };
}
