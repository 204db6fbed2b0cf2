import { randomUUID } from "node:crypto";
import type { Plan } from "../planner/types.js";
import type { RunState, RunStateView, TaskOutput } from "./types.js";

export type CreateRunStateOptions = {
  runId?: string;
  sessionId?: string;
  deepResearch?: boolean;
  plan?: Plan;
};

export function createRunState(query: string, opts?: CreateRunStateOptions): RunState {
  return {
    runId: opts?.runId ?? randomUUID(),
    query,
    sessionId: opts?.sessionId,
    deepResearch: opts?.deepResearch ?? false,
    plan: opts?.plan ?? null,
    taskResults: [],
    currentTaskIndex: 0,
    finalOutput: null,
    phase: opts?.plan ? "executing" : "planning",
    status: "pending",
    message: "",
    startedAt: Date.now(),
  };
}

function deepFreeze<T>(value: T): T {
  // typed arrays with elements cannot be frozen; their contents stay as written
  if (value instanceof ArrayBuffer || ArrayBuffer.isView(value)) return value;
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Check that an output can be snapshotted and frozen. Throws when it holds
 * something `structuredClone` rejects, such as a function.
 */
export function sealOutput(output: TaskOutput): TaskOutput {
  structuredClone(output);
  return deepFreeze(output);
}

/**
 * Write a task's output at its index. Each index is written exactly once and
 * entries are deep-frozen, so later tasks always observe what was written.
 */
export function recordResult(state: RunState, index: number, output: TaskOutput): void {
  if (index !== state.taskResults.length) {
    throw new RangeError(
      `Task result ${index} written out of order (next index is ${state.taskResults.length})`,
    );
  }
  state.taskResults.push(sealOutput(output));
}

export function totalTasks(state: Pick<RunState, "plan">): number {
  return state.plan?.tasks.length ?? 0;
}

/** Read-only view handed to handlers. */
export function viewOf(state: RunState): RunStateView {
  return state;
}

/** Detached copy for streaming; later mutations don't leak into emitted events. */
export function snapshot(state: RunState): RunState {
  return structuredClone(state);
}
