import { describe, expect, it } from "vitest";
import { computeProgress, describeStep, describeTask } from "../../src/engine/progress.js";
import { createRunState } from "../../src/engine/run-state.js";
import type { TaskOutput } from "../../src/engine/types.js";
import { createPlan } from "../../src/planner/plan.js";
import { searchOutput } from "../helpers.js";

const threeTasks = createPlan({
  intent: "x",
  tasks: [{ action: "search", query: "q" }, { action: "scrape", fromTask: "task:0" }, { action: "finalize" }],
});

describe("computeProgress", () => {
  it("counts planning and finalizing as one step each", () => {
    const state = createRunState("q", { plan: threeTasks });
    expect(computeProgress(state, "planner")).toBe(20);
    state.currentTaskIndex = 1;
    expect(computeProgress(state, "task_executor")).toBe(40);
    state.currentTaskIndex = 3;
    expect(computeProgress(state, "task_executor")).toBe(80);
    expect(computeProgress(state, "finalize")).toBe(100);
  });

  it("handles plans without tasks", () => {
    const state = createRunState("q", { plan: createPlan({ intent: "x", tasks: [] }) });
    expect(computeProgress(state, "planner")).toBe(50);
    expect(computeProgress(state, "finalize")).toBe(100);
  });

  it("never exceeds 100", () => {
    const state = createRunState("q", { plan: threeTasks });
    state.currentTaskIndex = 10;
    expect(computeProgress(state, "task_executor")).toBe(80);
  });
});

describe("describeTask", () => {
  const results: TaskOutput[] = [searchOutput(["http://a", "http://b"])];

  it("prefers the task's own description", () => {
    expect(describeTask({ taskResults: [] }, { action: "search", query: "q", urlIndex: 0, description: "Look around" })).toBe(
      "Look around",
    );
  });

  it("describes built-in actions", () => {
    expect(describeTask({ taskResults: [] }, { action: "search", query: "usb hub", urlIndex: 0 })).toBe(
      "Searching for: usb hub",
    );
    expect(describeTask({ taskResults: results }, { action: "scrape", fromTask: "task:0", urlIndex: 1 })).toBe(
      "Scraping product page: http://b",
    );
    expect(describeTask({ taskResults: [] }, { action: "summarize", fromTask: "task:1", urlIndex: 0 })).toBe(
      "Summarizing results of task 1",
    );
    expect(describeTask({ taskResults: [] }, { action: "sentiment", fromTask: "task:1", urlIndex: 0 })).toBe(
      "Analyzing sentiment of task 1",
    );
    expect(describeTask({ taskResults: [] }, { action: "compare", fromTask: "task:1,task:3", urlIndex: 0 })).toBe(
      "Comparing products from tasks 1, 3",
    );
    expect(describeTask({ taskResults: [] }, { action: "finalize", urlIndex: 0 })).toBe("Synthesizing final report...");
  });

  it("falls back to a generic label", () => {
    expect(describeTask({ taskResults: [] }, { action: "scrape", fromTask: "task:4", urlIndex: 0 })).toBe(
      "Running scrape task...",
    );
    expect(describeTask({ taskResults: [] }, { action: "translate", urlIndex: 0 })).toBe("Running translate task...");
  });
});

describe("describeStep", () => {
  it("describes the planner step with a task count", () => {
    const one = createRunState("q", { plan: createPlan({ intent: "x", tasks: [{ action: "finalize" }] }) });
    expect(describeStep(one, "planner")).toBe("Created research plan with 1 task");
    expect(describeStep(createRunState("q", { plan: threeTasks }), "planner")).toBe("Created research plan with 3 tasks");
  });

  it("describes the task just attempted", () => {
    const state = createRunState("q", { plan: threeTasks });
    state.currentTaskIndex = 1;
    expect(describeStep(state, "task_executor")).toBe("Searching for: q");
  });

  it("describes completion and cancellation", () => {
    const state = createRunState("q", { plan: threeTasks });
    expect(describeStep(state, "finalize")).toBe("Research complete");
    state.phase = "cancelled";
    expect(describeStep(state, "finalize")).toBe("Research cancelled");
  });
});
