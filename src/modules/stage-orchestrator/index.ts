/**
 * stage-orchestrator module: public API
 */

export type { StageOrchestrator, StageOrchestratorOptions } from './stage-orchestrator.js'
export { StageOrchestratorImpl, createStageOrchestrator } from './stage-orchestrator-impl.js'
export {
  PRESET_STAGES,
  StageRegistry,
  applyStageOverrides,
  createBuiltInStages,
  createStageRegistry,
} from './built-in-stages.js'
export { buildUpstreamContext, defaultStagePlanner, verificationTaskId } from './planners.js'
export { DEFAULT_STAGE_ENTRY_CEILING, PipelinePresetEnum, StageKindEnum } from './types.js'
export type {
  PipelinePreset,
  PlanContext,
  PlannedWorkOrder,
  RunRequest,
  RunResult,
  RunStatus,
  StageDefinition,
  StageFailureKind,
  StageKind,
  StagePlanner,
  StageResult,
  StageStatus,
  StageValidator,
  ValidationContext,
} from './types.js'
