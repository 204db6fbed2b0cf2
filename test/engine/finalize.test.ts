import { describe, expect, it } from "vitest";
import { extractFinalOutput, incompleteReport } from "../../src/engine/finalize.js";
import { recordResult, createRunState } from "../../src/engine/run-state.js";
import type { TaskOutput } from "../../src/engine/types.js";
import { createPlan } from "../../src/planner/plan.js";
import { searchOutput } from "../helpers.js";

function stateWith(outputs: TaskOutput[]) {
  const state = createRunState("best espresso grinder", {
    plan: createPlan({ intent: "x", tasks: outputs.map((o) => ({ action: o.kind === "error" || o.kind === "custom" ? o.action : o.kind })) }),
  });
  outputs.forEach((output, i) => recordResult(state, i, output));
  return state;
}

describe("extractFinalOutput", () => {
  it("copies the first non-empty final report", () => {
    const state = stateWith([
      searchOutput(["http://a"]),
      { kind: "finalize", finalReport: "   " },
      { kind: "finalize", finalReport: "# First" },
      { kind: "finalize", finalReport: "# Second" },
    ]);
    expect(extractFinalOutput(state)).toBe("# First");
    expect(state.finalOutput).toBe("# First");
  });

  it("skips failed finalize outputs", () => {
    const state = stateWith([
      { kind: "finalize", finalReport: null, error: "LLM down" },
      { kind: "finalize", finalReport: "# Report" },
    ]);
    expect(extractFinalOutput(state)).toBe("# Report");
  });

  it("falls back to the incomplete report", () => {
    const state = stateWith([
      searchOutput(["http://a"]),
      { kind: "scrape", productData: null, url: "http://a", error: "blocked" },
    ]);
    expect(extractFinalOutput(state)).toBe(
      [
        "# Research Incomplete",
        "",
        "**Query:** best espresso grinder",
        "",
        "No final report could be produced from 2 executed task(s).",
        "",
        "**Task errors:**",
        "- Task 1 (scrape): blocked",
      ].join("\n"),
    );
  });
});

describe("incompleteReport", () => {
  it("notes when no errors were recorded", () => {
    const report = incompleteReport({ query: "q", plan: null, taskResults: [] });
    expect(report.split("\n").slice(-2)).toEqual(["**Task errors:**", "- None recorded"]);
    expect(report).toContain("from 0 executed task(s)");
  });
});
