export { PipelineStep, ProductContext, createProductContext, executePipeline } from './PipelineInfrastructure';
export { ScriptStep } from './steps/ScriptStep';
export { VideoStep } from './steps/VideoStep';
export { MaterializeStep } from './steps/MaterializeStep';
export { PublishStep } from './steps/PublishStep';
export { BookkeepingStep } from './steps/BookkeepingStep';
