import type {
  ActivitySource,
  DroppedRecordKind,
  IngestionProgressEvent,
  MalformedReason,
} from "@deliverypulse/activity";
import type { HistoricalPeriodMetrics, IngestionCounts, PerformanceReport, Period } from "@deliverypulse/core";
import { createPipelineContext, type PipelineContext } from "../domain/pipeline-context.js";
import {
  transition,
  type PipelineEvent,
  type PipelineStage,
  type PipelineStatus,
} from "../domain/pipeline-state.js";
import { analyzeStage, harvestStage, summarizeStage, type PipelineConfig } from "./stages.js";

export type PipelineFailure = {
  stage: PipelineStage;
  code: string;
  message: string;
};

export type PipelineOutcome =
  | { status: "done"; report: PerformanceReport; trail: readonly PipelineStatus[] }
  | { status: "failed"; failure: PipelineFailure; trail: readonly PipelineStatus[] };

export type PipelineProgressEvent =
  | { stage: "stage_started"; pipelineStage: PipelineStage }
  | { stage: "stage_completed"; pipelineStage: PipelineStage }
  | { stage: "stage_failed"; pipelineStage: PipelineStage; code: string; message: string }
  | {
      stage: "events_dropped";
      kind: DroppedRecordKind;
      index: number;
      reason: MalformedReason | "out_of_period";
    }
  | { stage: "ingestion_summary"; counts: IngestionCounts };

export type RunPipelineInput = {
  period: Period;
  source: ActivitySource;
  history?: readonly HistoricalPeriodMetrics[];
  config?: PipelineConfig;
  generatedAt?: string;
  onProgress?: (event: PipelineProgressEvent) => void;
};

const errorCode = (error: unknown, stage: PipelineStage): string => {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }

  return `${stage}_failed`;
};

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const advance = (context: PipelineContext, event: PipelineEvent): void => {
  context.state = transition(context.state, event);
  context.trail.push(context.state.status);
};

type StageResult<T> = { ok: true; value: T } | { ok: false; failure: PipelineFailure };

const runStage = <T>(
  context: PipelineContext,
  stage: PipelineStage,
  completion: PipelineEvent,
  work: () => T,
  onProgress: RunPipelineInput["onProgress"],
): StageResult<T> => {
  // Progress callbacks run inside the guard so a throwing observer fails the stage.
  let value: T;
  try {
    onProgress?.({ stage: "stage_started", pipelineStage: stage });
    value = work();
    onProgress?.({ stage: "stage_completed", pipelineStage: stage });
  } catch (error) {
    const failure: PipelineFailure = { stage, code: errorCode(error, stage), message: errorMessage(error) };
    advance(context, { type: "fail", code: failure.code, message: failure.message });
    onProgress?.({ stage: "stage_failed", pipelineStage: stage, code: failure.code, message: failure.message });
    return { ok: false, failure };
  }

  advance(context, completion);
  return { ok: true, value };
};

/**
 * Runs harvest, analysis and summary in order over a context owned by this
 * call. A stage that throws, or whose progress notification throws, moves the
 * run to `failed` and later stages are skipped. An error thrown from the
 * `stage_failed` notification itself reaches the caller.
 */
export const runPipeline = (input: RunPipelineInput): PipelineOutcome => {
  const { onProgress } = input;
  const config = input.config ?? {};
  const generatedAt = input.generatedAt ?? new Date().toISOString();
  const context = createPipelineContext(input.period, input.history ?? []);

  const forwardIngestion = (event: IngestionProgressEvent): void => {
    if (event.stage === "record_dropped") {
      onProgress?.({ stage: "events_dropped", kind: event.kind, index: event.index, reason: event.reason });
    } else if (event.stage === "ingestion_completed") {
      onProgress?.({ stage: "ingestion_summary", counts: event.counts });
    }
  };

  const failed = (failure: PipelineFailure): PipelineOutcome => ({
    status: "failed",
    failure,
    trail: [...context.trail],
  });

  advance(context, { type: "start" });

  const harvested = runStage(
    context,
    "harvesting",
    { type: "harvested" },
    () => harvestStage(context, input.source, config, forwardIngestion),
    onProgress,
  );
  if (!harvested.ok) {
    return failed(harvested.failure);
  }

  const analyzed = runStage(context, "analyzing", { type: "analyzed" }, () => analyzeStage(context, config), onProgress);
  if (!analyzed.ok) {
    return failed(analyzed.failure);
  }

  const summarized = runStage(
    context,
    "summarizing",
    { type: "summarized" },
    () => summarizeStage(context, generatedAt),
    onProgress,
  );
  if (!summarized.ok) {
    return failed(summarized.failure);
  }

  return { status: "done", report: summarized.value, trail: [...context.trail] };
};
