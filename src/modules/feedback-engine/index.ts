export type { FeedbackEngine, FeedbackEngineOptions } from './feedback-engine.js'
export {
  DEFAULT_BASE_RETRY_DELAY_MS,
  DEFAULT_BASE_VALIDATION_TIMEOUT_SECONDS,
  DEFAULT_LOOP_TIME_CEILING_MS,
} from './feedback-engine.js'
export { FeedbackEngineImpl, createFeedbackEngine } from './feedback-engine-impl.js'
export {
  ORIGIN_RULES,
  SEVERITY_RULES,
  classifyFailureOrigin,
  classifySeverity,
  describeFailure,
  describeFailures,
  matchOriginRule,
  normalizeText,
} from './classification.js'
export type { OriginRule, SeverityRule } from './classification.js'
export { selectEscalationTarget } from './escalation.js'
export {
  BASE_SUCCESS_CRITERIA,
  buildEscalationInstruction,
  buildRetryInstruction,
  matchRemediationHints,
  renderDecision,
  successCriteriaFor,
} from './remediation.js'
export { FailureRecordSchema, ValidationResultSchema } from './types.js'
export type {
  AbortDecision,
  AbortTrigger,
  ContinueDecision,
  CriterionValue,
  EscalateDecision,
  EscalationPolicy,
  FailureOrigin,
  FailureRecord,
  FailureRecordInput,
  FeedbackAction,
  FeedbackDecision,
  RedirectedDecision,
  RegisterLoopInput,
  RemediationPlan,
  RetryDecision,
  RetryStrategy,
  RollbackDecision,
  RouteToProducerInput,
  RunFeedbackStatus,
  Severity,
  StrategyMap,
  ValidationRequirements,
  ValidationResult,
  ValidationResultInput,
} from './types.js'
