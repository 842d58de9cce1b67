import { describe, expect, it } from "vitest";
import { IllegalTransitionError, isTerminal, transition, type PipelineState } from "./pipeline-state.js";

describe("transition", () => {
  it("walks the stages in order", () => {
    let state: PipelineState = { status: "idle" };
    const visited: string[] = [state.status];
    for (const type of ["start", "harvested", "analyzed", "summarized"] as const) {
      state = transition(state, { type });
      visited.push(state.status);
    }

    expect(visited).toEqual(["idle", "harvesting", "analyzing", "summarizing", "done"]);
    expect(isTerminal(state)).toBe(true);
  });

  it("records the failing stage", () => {
    const state = transition({ status: "analyzing" }, { type: "fail", code: "boom", message: "analysis broke" });

    expect(state).toEqual({ status: "failed", stage: "analyzing", code: "boom", message: "analysis broke" });
    expect(isTerminal(state)).toBe(true);
  });

  it("rejects skipped and out-of-order events", () => {
    expect(() => transition({ status: "idle" }, { type: "harvested" })).toThrow(IllegalTransitionError);
    expect(() => transition({ status: "harvesting" }, { type: "analyzed" })).toThrow(
      "cannot apply analyzed in state harvesting",
    );
    expect(() => transition({ status: "idle" }, { type: "fail", code: "x", message: "x" })).toThrow(
      IllegalTransitionError,
    );
  });

  it("keeps terminal states terminal", () => {
    expect(() => transition({ status: "done" }, { type: "start" })).toThrow(IllegalTransitionError);
    expect(() =>
      transition(
        { status: "failed", stage: "harvesting", code: "x", message: "x" },
        { type: "fail", code: "y", message: "y" },
      ),
    ).toThrow(IllegalTransitionError);
  });
});
