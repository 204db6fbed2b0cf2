import { getConfig } from "../config.js";
import { TimeoutError } from "../errors.js";
import type { HandlerContext, RunStateView, TaskHandler, TaskOutput } from "../engine/types.js";
import type { Task, TaskAction } from "../planner/types.js";
import { createLogger, errorMessage } from "../utils/logger.js";

export type HandlerFunction = (state: RunStateView, task: Task, ctx: HandlerContext) => Promise<TaskOutput>;

export type FunctionHandlerOptions = {
  action: TaskAction;
  fn: HandlerFunction;
  description?: string;
  /** Timeout in ms (default: timeouts.handlerDefault) */
  timeout?: number;
  /** Shape a failure as this action's output; defaults to a generic error output. */
  onError?: (message: string, task: Task) => TaskOutput;
};

/**
 * Wraps an async function as a task handler. Throws and timeouts never escape:
 * they come back as the action's error output. The function receives a signal
 * that fires on timeout or when the run is cancelled.
 */
export class FunctionHandler implements TaskHandler {
  readonly action: TaskAction;
  readonly description?: string;
  readonly timeout: number;

  private fn: HandlerFunction;
  private onError: (message: string, task: Task) => TaskOutput;

  constructor(opts: FunctionHandlerOptions) {
    this.action = opts.action;
    this.fn = opts.fn;
    this.description = opts.description;
    this.timeout = opts.timeout ?? getConfig().timeouts.handlerDefault;
    this.onError = opts.onError ?? ((message) => ({ kind: "error", action: this.action, error: message }));
  }

  async run(state: RunStateView, task: Task, ctx: HandlerContext): Promise<TaskOutput> {
    const logger = createLogger(this.action);
    const start = Date.now();
    const timeoutController = new AbortController();
    const signal = AbortSignal.any([ctx.signal, timeoutController.signal]);
    let timer: ReturnType<typeof setTimeout> | undefined;

    try {
      const result = await Promise.race([
        this.fn(state, task, { ...ctx, signal }),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => {
            const err = new TimeoutError(`${this.action} task`, this.timeout);
            timeoutController.abort(err);
            reject(err);
          }, this.timeout);
        }),
      ]);
      logger.debug(`Task ${ctx.taskIndex} finished`, { durationMs: Date.now() - start });
      return result;
    } catch (err) {
      const message = errorMessage(err);
      logger.error(`Task ${ctx.taskIndex} failed`, { runId: ctx.runId, error: message });
      ctx.report("error", `${this.action} failed: ${message}`);
      return this.onError(message, task);
    } finally {
      clearTimeout(timer);
    }
  }
}
