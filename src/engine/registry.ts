import { ValidationError } from "../errors.js";
import type { TaskAction } from "../planner/types.js";
import { log } from "../utils/logger.js";
import type { TaskHandler } from "./types.js";

/** Action name → handler. Open for extension: any action name may be registered. */
export class HandlerRegistry {
  private handlers = new Map<TaskAction, TaskHandler>();

  constructor(handlers: Iterable<TaskHandler> = []) {
    for (const handler of handlers) this.register(handler);
  }

  register(handler: TaskHandler): void {
    if (this.handlers.has(handler.action)) {
      throw new ValidationError(
        "DUPLICATE_REGISTRATION",
        `Handler for action "${handler.action}" already registered`,
      );
    }
    this.handlers.set(handler.action, handler);
    log.debug(`Registered handler "${handler.action}"`);
  }

  /** Register, replacing an existing handler for the same action. */
  replace(handler: TaskHandler): void {
    this.handlers.set(handler.action, handler);
  }

  remove(action: TaskAction): boolean {
    return this.handlers.delete(action);
  }

  get(action: TaskAction): TaskHandler | undefined {
    return this.handlers.get(action);
  }

  has(action: TaskAction): boolean {
    return this.handlers.has(action);
  }

  list(): TaskHandler[] {
    return [...this.handlers.values()];
  }

  actions(): TaskAction[] {
    return [...this.handlers.keys()];
  }
}
