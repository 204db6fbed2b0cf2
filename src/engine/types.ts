import type { Plan, Task, TaskAction } from "../planner/types.js";
import type { ProductData, SearchResult, SentimentAnalysis } from "../schemas.js";

// ---------------------------------------------------------------------------
// Task outputs
// ---------------------------------------------------------------------------

type OutputBase = {
  /** Present when the task failed; the run continues regardless. */
  error?: string;
};

export type SearchOutput = OutputBase & {
  kind: "search";
  searchResults: SearchResult[];
  productUrls: string[];
  primaryUrl: string | null;
  resultsCount: number;
};

export type ScrapeOutput = OutputBase & {
  kind: "scrape";
  productData: ProductData | null;
  url: string | null;
};

export type SummarizeOutput = OutputBase & {
  kind: "summarize";
  summary: string | null;
};

export type SentimentOutput = OutputBase & {
  kind: "sentiment";
  sentiment: SentimentAnalysis | null;
  rating?: number | null;
  reviewCount?: number | null;
};

export type CompareOutput = OutputBase & {
  kind: "compare";
  comparison: string | null;
  productsCompared?: string[];
  comparisonCount?: number;
};

export type FinalReportOutput = OutputBase & {
  kind: "finalize";
  finalReport: string | null;
};

/** Unknown actions, escaped exceptions and outputs of custom handlers that only failed. */
export type ErrorOutput = {
  kind: "error";
  action: TaskAction;
  error: string;
};

/** Free-form output of a handler registered for a non-built-in action. */
export type CustomOutput = OutputBase & {
  kind: "custom";
  action: TaskAction;
  data: Record<string, unknown>;
};

export type TaskOutput =
  | SearchOutput
  | ScrapeOutput
  | SummarizeOutput
  | SentimentOutput
  | CompareOutput
  | FinalReportOutput
  | ErrorOutput
  | CustomOutput;

export type OutputKind = TaskOutput["kind"];

// ---------------------------------------------------------------------------
// Run state
// ---------------------------------------------------------------------------

export type RunPhase = "planning" | "executing" | "finalizing" | "done" | "cancelled";

export type RunState = {
  readonly runId: string;
  readonly query: string;
  readonly sessionId?: string;
  readonly deepResearch: boolean;
  plan: Plan | null;
  /** Index-addressed, append-only. Entries are frozen once written. */
  readonly taskResults: TaskOutput[];
  currentTaskIndex: number;
  finalOutput: string | null;
  phase: RunPhase;
  /** Progress text only; task logic never reads these. */
  status: string;
  message: string;
  readonly startedAt: number;
  finishedAt?: number;
};

/** What handlers get to see: everything, mutable nothing. */
export type RunStateView = {
  readonly runId: string;
  readonly query: string;
  readonly sessionId?: string;
  readonly deepResearch: boolean;
  readonly plan: Plan | null;
  readonly taskResults: readonly Readonly<TaskOutput>[];
  readonly currentTaskIndex: number;
};

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

export type HandlerContext = {
  readonly runId: string;
  readonly sessionId?: string;
  readonly deepResearch: boolean;
  readonly taskIndex: number;
  readonly signal: AbortSignal;
  /** Update the transient status/message shown to streaming callers. */
  report(status: string, message: string): void;
};

export interface TaskHandler {
  readonly action: TaskAction;
  readonly description?: string;
  /** Per-task timeout in ms; the dispatcher does not enforce one itself. */
  readonly timeout?: number;
  run(state: RunStateView, task: Task, ctx: HandlerContext): Promise<TaskOutput>;
}

// ---------------------------------------------------------------------------
// Streaming
// ---------------------------------------------------------------------------

export type StepName = "planner" | "task_executor" | "finalize";

export type StepMetadata = {
  action?: TaskAction;
  taskIndex?: number;
  totalTasks: number;
  durationMs?: number;
  failed?: boolean;
};

export type StepEvent = {
  step: StepName;
  state: RunState;
  /** 0-100, non-decreasing within a run. */
  progress: number;
  description: string;
  metadata?: StepMetadata;
};

export type TerminalValue =
  | { type: "result"; reportId: string; finalOutput: string }
  | { type: "error"; reportId: string; error: { code: string; message: string } };

export type RunOutcome = {
  state: RunState;
  terminal: TerminalValue;
};

// ---------------------------------------------------------------------------
// Persistence
// ---------------------------------------------------------------------------

export type ReportStatus = "completed" | "cancelled" | "failed";

/** A finished run as it is persisted and served by the reports API. */
export type ReportRecord = {
  id: string;
  query: string;
  sessionId?: string;
  deepResearch: boolean;
  intent: string | null;
  status: ReportStatus;
  plan: Plan | null;
  taskResults: TaskOutput[];
  finalOutput: string | null;
  error?: string;
  createdAt: number;
  finishedAt?: number;
};

export interface ReportSink {
  save(record: ReportRecord): void | Promise<void>;
}
