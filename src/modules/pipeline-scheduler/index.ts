export type { PipelineScheduler } from './pipeline-scheduler.js'
export { PipelineSchedulerImpl, createPipelineScheduler } from './pipeline-scheduler-impl.js'
export type {
  DispatchMode,
  DispatchOptions,
  InstructionProducer,
  PipelineRun,
  PipelineRunStatus,
  PipelineSchedulerOptions,
  ProductionContext,
} from './types.js'
export { DispatchModeEnum, DEFAULT_PRODUCTION_TIMEOUT_MS, DEFAULT_WORKER_POOL_SIZE } from './types.js'
export { detectCycle, topologicalOrder, validateReferences } from './dependency-resolver.js'
export type { DependencyNode } from './dependency-resolver.js'
export { renderInstructionBatch, renderInvocation, escapeMarkup } from './instruction-batch.js'
export type { BatchEntry, BatchHeader } from './instruction-batch.js'
export { defaultInstructionProducer, appendCarryOver, reportedResult } from './instruction-producer.js'
