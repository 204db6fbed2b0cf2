export const TASK_ACTIONS = ["search", "scrape", "summarize", "sentiment", "compare", "finalize"] as const;

/** Built-in actions. The registry also accepts handlers for other names. */
export type BuiltinAction = (typeof TASK_ACTIONS)[number];

export type TaskAction = BuiltinAction | (string & {});

export type Task = {
  readonly action: TaskAction;
  /** Free-text input; required when the task doesn't follow another. */
  readonly query?: string;
  /** `"task:<index>"`, comma-separated for several, e.g. `"task:1,task:3"`. */
  readonly fromTask?: string;
  /** Element of a prior list-valued output to pick (default 0). */
  readonly urlIndex: number;
  /** Progress label only. */
  readonly description?: string;
};

export type Plan = {
  readonly intent: string;
  readonly tasks: readonly Task[];
  readonly reasoning?: string;
};

/** Input accepted by `createPlan`; `urlIndex` may be omitted. */
export type TaskInput = Omit<Task, "urlIndex"> & { urlIndex?: number };

export type PlanInput = {
  intent: string;
  tasks: TaskInput[];
  reasoning?: string;
};

export type PlanningService = {
  plan(query: string): Promise<Plan>;
};

export type OrderViolation = {
  taskIndex: number;
  reference: string;
  reason: "malformed" | "self" | "forward";
};
