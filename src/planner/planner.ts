import { getConfig } from "../config.js";
import { PlanResponseSchema, type PlanResponse } from "../schemas.js";
import type { LlmClient } from "../services/llm.js";
import { log, errorMessage } from "../utils/logger.js";
import { checkPlanOrder, createPlan, fallbackPlan } from "./plan.js";
import type { Plan, PlanningService, TaskInput } from "./types.js";

function plannerSystemPrompt(now = new Date()): string {
  const date = now.toLocaleDateString("en-US", { year: "numeric", month: "long", day: "numeric" });
  return `Current date: ${date}

You are an expert research planner for e-commerce product analysis. Turn the user's query into an
ordered list of tasks.

Available actions:
- "search": search the web for product pages (requires "query")
- "scrape": extract product data from a page (requires "from_task" or a URL in "query")
- "summarize": summarize one product (requires "from_task" pointing at a scrape)
- "sentiment": analyze sentiment for one product (requires "from_task" pointing at a scrape)
- "compare": compare several products (requires "from_task" listing several scrapes)
- "finalize": synthesize everything into the final report (always last)

Rules:
1. If the query contains a URL, start with "scrape"
2. Otherwise start with "search", then scrape several of the top results
3. Scrapes after a search pick different results with "url_index" (0, 1, 2)
4. "from_task" references earlier tasks only: "task:0", or "task:1,task:3" for several
5. For comparisons, scrape every product before "compare"
6. Always end with "finalize"

Examples:

Query: "Sony WH-1000XM5 headphones"
{
  "intent": "product_research",
  "reasoning": "Search, then scrape and analyze the top two results.",
  "tasks": [
    {"action": "search", "query": "Sony WH-1000XM5 headphones"},
    {"action": "scrape", "from_task": "task:0", "url_index": 0},
    {"action": "summarize", "from_task": "task:1"},
    {"action": "sentiment", "from_task": "task:1"},
    {"action": "scrape", "from_task": "task:0", "url_index": 1},
    {"action": "summarize", "from_task": "task:4"},
    {"action": "sentiment", "from_task": "task:4"},
    {"action": "finalize"}
  ]
}

Query: "Compare Kindle Paperwhite vs Kobo Clara"
{
  "intent": "product_comparison",
  "tasks": [
    {"action": "search", "query": "Kindle Paperwhite"},
    {"action": "scrape", "from_task": "task:0", "url_index": 0},
    {"action": "search", "query": "Kobo Clara"},
    {"action": "scrape", "from_task": "task:2", "url_index": 0},
    {"action": "compare", "from_task": "task:1,task:3"},
    {"action": "finalize"}
  ]
}

Query: "https://www.example-shop.com/p/desk-lamp-42"
{
  "intent": "product_analysis",
  "tasks": [
    {"action": "scrape", "query": "https://www.example-shop.com/p/desk-lamp-42"},
    {"action": "summarize", "from_task": "task:0"},
    {"action": "sentiment", "from_task": "task:0"},
    {"action": "finalize"}
  ]
}

Respond with JSON only.`;
}

export type PlannerOptions = {
  /** Without an LLM every query gets the fallback plan. */
  llm?: LlmClient | null;
  /** Default: `planning.strictOrder`. */
  strictOrder?: boolean;
  /** Default: `limits.maxPlanTasks`. */
  maxTasks?: number;
};

export class LlmPlanner implements PlanningService {
  private llm: LlmClient | null;
  private strictOrder: boolean;
  private maxTasks: number;

  constructor(opts?: PlannerOptions) {
    const cfg = getConfig();
    this.llm = opts?.llm ?? null;
    this.strictOrder = opts?.strictOrder ?? cfg.planning.strictOrder;
    this.maxTasks = Math.max(2, opts?.maxTasks ?? cfg.limits.maxPlanTasks);
  }

  /** Plan for a query. Never throws: any failure yields the fallback plan. */
  async plan(query: string): Promise<Plan> {
    if (!this.llm) {
      log.info("No LLM configured, using fallback plan");
      return fallbackPlan(query);
    }

    let response: PlanResponse;
    try {
      response = await this.llm.completeJson(this.buildPrompt(query), PlanResponseSchema, {
        model: getConfig().llm.plannerModel,
        system: plannerSystemPrompt(),
        temperature: 0.3,
      });
    } catch (err) {
      log.warn("Planner failed, using fallback plan", { error: errorMessage(err) });
      return fallbackPlan(query);
    }

    const plan = createPlan({
      intent: response.intent,
      reasoning: response.reasoning,
      tasks: this.normalizeTasks(response.tasks),
    });

    const violations = checkPlanOrder(plan);
    for (const v of violations) {
      log.warn(`Task ${v.taskIndex} has a ${v.reason} reference "${v.reference}"`);
    }
    if (violations.length > 0 && this.strictOrder) {
      log.warn("Rejecting plan with out-of-order references, using fallback plan", { violations: violations.length });
      return fallbackPlan(query);
    }

    log.info(`Created plan with ${plan.tasks.length} tasks`, { intent: plan.intent });
    return plan;
  }

  private buildPrompt(query: string): string {
    return `Create a research plan for this query:

Query: ${query}

Respond with a JSON object:
{
  "intent": "short snake_case description of the goal",
  "tasks": [
    {"action": "search|scrape|summarize|sentiment|compare|finalize", "query": "optional", "from_task": "optional", "url_index": 0}
  ],
  "reasoning": "optional explanation"
}`;
  }

  /** Cap the task count and make sure the plan ends in a report. */
  private normalizeTasks(tasks: TaskInput[]): TaskInput[] {
    let result = tasks;
    if (result.length > this.maxTasks) {
      log.warn("Plan too long, truncating", { tasks: result.length, max: this.maxTasks });
      result = [...result.slice(0, this.maxTasks - 1).filter((t) => t.action !== "finalize"), { action: "finalize" }];
    }
    if (!result.some((t) => t.action === "finalize")) {
      result = [...result, { action: "finalize" }];
    }
    return result;
  }
}
