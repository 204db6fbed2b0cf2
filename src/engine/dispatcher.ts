import { ValidationError } from "../errors.js";
import type { Task } from "../planner/types.js";
import { log, errorMessage } from "../utils/logger.js";
import { extractFinalOutput } from "./finalize.js";
import { computeProgress, describeStep, describeTask } from "./progress.js";
import type { HandlerRegistry } from "./registry.js";
import { recordResult, sealOutput, snapshot, totalTasks, viewOf } from "./run-state.js";
import type { HandlerContext, RunState, StepEvent, TaskOutput } from "./types.js";

export type DispatchOptions = {
  /** Stop scheduling further tasks once aborted. Written results stay. */
  signal?: AbortSignal;
  onTaskStart?: (index: number, task: Task) => void;
  onTaskEnd?: (index: number, task: Task, output: TaskOutput) => void;
};

/**
 * Sequential, index-driven task loop. Each iteration attempts exactly one
 * task, writes exactly one result and advances the index by one whatever
 * happened, so a plan of N tasks takes exactly N iterations.
 *
 * Plans are trusted to reference only earlier tasks; a forward reference
 * simply resolves to an empty result.
 */
export class Dispatcher {
  private registry: HandlerRegistry;

  constructor(registry: HandlerRegistry) {
    this.registry = registry;
  }

  /** Run the remaining tasks, yielding a `task_executor` event after each attempt. */
  async *executeTasks(state: RunState, opts?: DispatchOptions): AsyncGenerator<StepEvent, void, undefined> {
    const plan = state.plan;
    if (!plan) {
      throw new ValidationError("VALIDATION_FAILED", "Cannot execute a run before it has a plan");
    }
    const signal = opts?.signal ?? new AbortController().signal;
    state.phase = "executing";

    while (state.currentTaskIndex < plan.tasks.length) {
      if (signal.aborted) {
        this.cancel(state);
        return;
      }

      const index = state.currentTaskIndex;
      const task = plan.tasks[index];
      const start = Date.now();

      opts?.onTaskStart?.(index, task);
      const output = this.seal(state, task, index, await this.dispatch(state, task, index, signal));

      recordResult(state, index, output);
      state.currentTaskIndex = index + 1;
      opts?.onTaskEnd?.(index, task, output);

      yield {
        step: "task_executor",
        state: snapshot(state),
        progress: computeProgress(state, "task_executor"),
        description: describeTask(state, task),
        metadata: {
          action: task.action,
          taskIndex: index,
          totalTasks: plan.tasks.length,
          durationMs: Date.now() - start,
          failed: output.error !== undefined,
        },
      };
    }
  }

  /** Terminal extraction: always leaves `finalOutput` set and the run `done`. */
  finalize(state: RunState): StepEvent {
    state.phase = "finalizing";
    extractFinalOutput(state);
    state.phase = "done";
    state.status = "completed";
    state.message = "Research complete";
    state.finishedAt = Date.now();

    return {
      step: "finalize",
      state: snapshot(state),
      progress: computeProgress(state, "finalize"),
      description: describeStep(state, "finalize"),
      metadata: { totalTasks: totalTasks(state) },
    };
  }

  /** Tasks then finalization. Nothing after a cancellation. */
  async *run(state: RunState, opts?: DispatchOptions): AsyncGenerator<StepEvent, void, undefined> {
    yield* this.executeTasks(state, opts);
    if (state.phase === "cancelled") return;
    yield this.finalize(state);
  }

  /** Drive a run to completion without streaming. */
  async execute(state: RunState, opts?: DispatchOptions): Promise<RunState> {
    for await (const _event of this.run(state, opts)) {
      // events are only of interest to streaming callers
    }
    return state;
  }

  /** An output that cannot be cloned or frozen is recorded as an error for its task. */
  private seal(state: RunState, task: Task, index: number, output: TaskOutput): TaskOutput {
    try {
      return sealOutput(output);
    } catch (err) {
      const error = `${task.action} result could not be recorded: ${errorMessage(err)}`;
      log.warn(error, { runId: state.runId, taskIndex: index });
      state.status = "error";
      state.message = error;
      return sealOutput({ kind: "error", action: task.action, error });
    }
  }

  private cancel(state: RunState): void {
    state.phase = "cancelled";
    state.status = "cancelled";
    state.message = `Cancelled after ${state.currentTaskIndex} of ${totalTasks(state)} tasks`;
    state.finishedAt = Date.now();
    log.info("Run cancelled", { runId: state.runId, completedTasks: state.currentTaskIndex });
  }

  private async dispatch(state: RunState, task: Task, index: number, signal: AbortSignal): Promise<TaskOutput> {
    const handler = this.registry.get(task.action);
    if (!handler) {
      log.warn(`Unknown action "${task.action}"`, { runId: state.runId, taskIndex: index });
      state.status = "error";
      state.message = `Unknown action: ${task.action}`;
      return { kind: "error", action: task.action, error: `Unknown action: ${task.action}` };
    }

    state.status = "running";
    state.message = describeTask(state, task);
    log.info(`Dispatching task ${index} "${task.action}"`, { runId: state.runId });

    const ctx: HandlerContext = {
      runId: state.runId,
      sessionId: state.sessionId,
      deepResearch: state.deepResearch,
      taskIndex: index,
      signal,
      report: (status, message) => {
        state.status = status;
        state.message = message;
      },
    };

    let output: TaskOutput;
    try {
      output = await handler.run(viewOf(state), task, ctx);
    } catch (err) {
      // Handlers are meant to catch their own failures; this is the backstop.
      const message = errorMessage(err);
      log.error(`Task ${index} "${task.action}" threw`, { runId: state.runId, error: message });
      output = { kind: "error", action: task.action, error: message };
    }

    if (output.error !== undefined) {
      state.status = "error";
      state.message = `${task.action} failed: ${output.error}`;
    } else if (state.status === "running") {
      state.status = "completed";
      state.message = `Completed ${task.action} task`;
    }
    return output;
  }
}
