export {
  IllegalTransitionError,
  isTerminal,
  transition,
  type PipelineEvent,
  type PipelineStage,
  type PipelineState,
  type PipelineStatus,
} from "./domain/pipeline-state.js";
export { createPipelineContext, type AnalysisOutput, type PipelineContext } from "./domain/pipeline-context.js";
export {
  PipelinePreconditionError,
  analyzeStage,
  harvestStage,
  summarizeStage,
  type PipelineConfig,
} from "./application/stages.js";
export {
  runPipeline,
  type PipelineFailure,
  type PipelineOutcome,
  type PipelineProgressEvent,
  type RunPipelineInput,
} from "./application/run-pipeline.js";
