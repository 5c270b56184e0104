/**
 * quality-gates module: gate report intake and gate remediation
 */

// Types
export type {
  GateEvaluation,
  EvaluatorFn,
  GateConfig,
  GateResult,
  GateRouting,
  GateRemediation,
  GatePipelineResult,
  GateStatus,
  GateViolation,
  QualityGateReport,
  QualityGateReportInput,
} from './types.js'
export { QualityGateReportSchema, GateStatusEnum } from './types.js'

// Gate interface and implementation
export type { QualityGate } from './gate.js'
export { QualityGateImpl, createQualityGate, buildGateFixPrompt, violationText } from './gate-impl.js'

// Pipeline
export type { GatePipeline, GateReportSource } from './gate-pipeline.js'
export {
  GatePipelineImpl,
  createGatePipeline,
  createGateValidator,
  gateFailureType,
  resultGateReports,
} from './gate-pipeline.js'

// Registry
export { GateRegistry, createGateRegistry, statusEvaluator } from './gate-registry.js'
