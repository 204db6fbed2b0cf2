import { randomUUID } from "node:crypto";
import { isEngineError, ValidationError } from "../errors.js";
import { fallbackPlan, planSummary } from "../planner/plan.js";
import type { Plan, PlanningService } from "../planner/types.js";
import { log, errorMessage } from "../utils/logger.js";
import { Dispatcher } from "./dispatcher.js";
import { computeProgress, describeStep } from "./progress.js";
import { HandlerRegistry } from "./registry.js";
import { createRunState, snapshot, totalTasks } from "./run-state.js";
import type { ReportRecord, ReportSink, RunOutcome, RunState, StepEvent, TerminalValue } from "./types.js";

export type ResearchEngineOptions = {
  /** Produces plans; without one every run uses the fallback plan. */
  planner?: PlanningService;
  registry?: HandlerRegistry;
  /** Receives every finished or cancelled run. Failures are logged, never raised. */
  sink?: ReportSink;
};

export type ResearchOptions = {
  signal?: AbortSignal;
  sessionId?: string;
  deepResearch?: boolean;
  /** Use this id for the run and its persisted report (default: random UUID). */
  reportId?: string;
  /** Skip planning and execute this plan as given. */
  plan?: Plan;
};

export class ResearchEngine {
  readonly registry: HandlerRegistry;
  private planner?: PlanningService;
  private sink?: ReportSink;
  private dispatcher: Dispatcher;

  constructor(opts?: ResearchEngineOptions) {
    this.registry = opts?.registry ?? new HandlerRegistry();
    this.planner = opts?.planner;
    this.sink = opts?.sink;
    this.dispatcher = new Dispatcher(this.registry);
  }

  /**
   * Plan for a query. Never fails: a planner error or an empty plan falls
   * back to the deterministic plan.
   */
  async plan(query: string): Promise<Plan> {
    if (!this.planner) return fallbackPlan(query);
    try {
      const plan = await this.planner.plan(query);
      if (plan.tasks.length > 0) return plan;
      log.warn("Planner returned an empty plan, using fallback", { query });
    } catch (err) {
      log.warn("Planning failed, using fallback plan", { query, error: errorMessage(err) });
    }
    return fallbackPlan(query);
  }

  /**
   * Stream a research run: one `planner` event, one `task_executor` event per
   * task, then a `finalize` event. The generator's return value is the
   * terminal result (or a CANCELLED error when the signal fired mid-run).
   */
  async *stream(query: string, opts?: ResearchOptions): AsyncGenerator<StepEvent, TerminalValue, undefined> {
    const state = this.createState(query, opts);
    return yield* this.drive(state, opts);
  }

  /** Run to completion and return the final state with its terminal value. */
  async run(query: string, opts?: ResearchOptions): Promise<RunOutcome> {
    const state = this.createState(query, opts);
    const gen = this.drive(state, opts);
    let next = await gen.next();
    while (!next.done) {
      next = await gen.next();
    }
    return { state, terminal: next.value };
  }

  private createState(query: string, opts?: ResearchOptions): RunState {
    const trimmed = query.trim();
    if (!trimmed) {
      throw new ValidationError("VALIDATION_FAILED", "query must not be empty");
    }
    return createRunState(trimmed, {
      runId: opts?.reportId ?? randomUUID(),
      sessionId: opts?.sessionId,
      deepResearch: opts?.deepResearch ?? false,
    });
  }

  private async *drive(state: RunState, opts?: ResearchOptions): AsyncGenerator<StepEvent, TerminalValue, undefined> {
    const signal = opts?.signal ?? new AbortController().signal;
    log.info("Research run started", { runId: state.runId, query: state.query, deepResearch: state.deepResearch });

    try {
      state.status = "planning";
      state.message = "Creating research plan...";
      state.plan = opts?.plan ?? (await this.plan(state.query));
      state.phase = "executing";
      state.status = "planned";
      state.message = describeStep(state, "planner");
      log.info("Plan ready", { runId: state.runId, ...planSummary(state.plan) });

      yield {
        step: "planner",
        state: snapshot(state),
        progress: computeProgress(state, "planner"),
        description: state.message,
        metadata: { totalTasks: totalTasks(state) },
      };

      yield* this.dispatcher.run(state, { signal });
    } catch (err) {
      const error = isEngineError(err) ? err.toJSON() : { code: "INTERNAL_ERROR", message: errorMessage(err) };
      log.error("Research run failed", { runId: state.runId, error: error.message });
      state.status = "error";
      state.message = error.message;
      state.finishedAt = Date.now();
      await this.persist(state, "failed", error.message);
      return { type: "error", reportId: state.runId, error };
    }

    if (state.phase === "cancelled") {
      await this.persist(state, "cancelled", state.message);
      return { type: "error", reportId: state.runId, error: { code: "CANCELLED", message: state.message } };
    }

    log.info("Research run finished", {
      runId: state.runId,
      tasks: state.taskResults.length,
      failed: state.taskResults.filter((r) => r.error !== undefined).length,
      durationMs: (state.finishedAt ?? Date.now()) - state.startedAt,
    });
    await this.persist(state, "completed");
    return { type: "result", reportId: state.runId, finalOutput: state.finalOutput ?? "" };
  }

  private async persist(state: RunState, status: ReportRecord["status"], error?: string): Promise<void> {
    if (!this.sink) return;
    const record: ReportRecord = {
      id: state.runId,
      query: state.query,
      sessionId: state.sessionId,
      deepResearch: state.deepResearch,
      intent: state.plan?.intent ?? null,
      status,
      plan: state.plan,
      taskResults: [...state.taskResults],
      finalOutput: state.finalOutput,
      error,
      createdAt: state.startedAt,
      finishedAt: state.finishedAt,
    };
    try {
      await this.sink.save(record);
    } catch (err) {
      log.error("Failed to persist report", { reportId: state.runId, error: errorMessage(err) });
    }
  }
}
