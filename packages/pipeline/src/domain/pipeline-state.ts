export type PipelineStage = "harvesting" | "analyzing" | "summarizing";

export type PipelineState =
  | { status: "idle" }
  | { status: PipelineStage }
  | { status: "done" }
  | { status: "failed"; stage: PipelineStage; code: string; message: string };

export type PipelineStatus = PipelineState["status"];

export type PipelineEvent =
  | { type: "start" }
  | { type: "harvested" }
  | { type: "analyzed" }
  | { type: "summarized" }
  | { type: "fail"; code: string; message: string };

export class IllegalTransitionError extends Error {
  readonly code = "illegal_transition";

  constructor(
    readonly from: PipelineStatus,
    readonly event: PipelineEvent["type"],
  ) {
    super(`cannot apply ${event} in state ${from}`);
    this.name = "IllegalTransitionError";
  }
}

const completions: Readonly<Record<PipelineStage, { event: PipelineEvent["type"]; next: PipelineState }>> = {
  harvesting: { event: "harvested", next: { status: "analyzing" } },
  analyzing: { event: "analyzed", next: { status: "summarizing" } },
  summarizing: { event: "summarized", next: { status: "done" } },
};

/**
 * `done` and `failed` are terminal; every event applied to them is illegal.
 */
export const transition = (state: PipelineState, event: PipelineEvent): PipelineState => {
  switch (state.status) {
    case "idle":
      if (event.type === "start") {
        return { status: "harvesting" };
      }
      break;
    case "harvesting":
    case "analyzing":
    case "summarizing": {
      if (event.type === "fail") {
        return { status: "failed", stage: state.status, code: event.code, message: event.message };
      }

      const completion = completions[state.status];
      if (event.type === completion.event) {
        return completion.next;
      }
      break;
    }
    case "done":
    case "failed":
      break;
  }

  throw new IllegalTransitionError(state.status, event.type);
};

export const isTerminal = (state: PipelineState): boolean =>
  state.status === "done" || state.status === "failed";
