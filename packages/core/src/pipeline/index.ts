export { ReviewPipeline, deriveMetadata } from './review_pipeline';
export { PIPELINE_PHASES, PIPELINE_STEPS } from './pipeline.types';
export type {
  PipelineOutcome,
  PipelineRunOptions,
  ReviewPipelineDependencies,
  SkipReason,
} from './pipeline.types';
