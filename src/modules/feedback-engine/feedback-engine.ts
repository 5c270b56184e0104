/**
 * FeedbackEngine: decides what happens after a validation result.
 *
 * Each failing work order gets a feedback loop in the State Store. Every
 * failure on the loop is analyzed in a fixed order (abort, escalate, retry)
 * against the loop's retry strategy; a success closes it.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { LoopId, RunId } from '../../core/types.js'
import type { CleanupOptions, CleanupReport, FeedbackContext, StateStore } from '../state-store/index.js'
import type {
  ContinueDecision,
  FailureOrigin,
  FailureRecordInput,
  FeedbackDecision,
  RedirectedDecision,
  RegisterLoopInput,
  RetryStrategy,
  RollbackDecision,
  RouteToProducerInput,
  RunFeedbackStatus,
  StrategyMap,
  ValidationResultInput,
} from './types.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface FeedbackEngineOptions {
  stateStore: StateStore
  strategies: StrategyMap
  eventBus?: TypedEventBus
  now?: () => Date
  /** A loop older than this aborts on its next failure (default 1 hour) */
  loopTimeCeilingMs?: number
  /** Delay before the first retry; later retries multiply by the backoff factor (default 1000) */
  baseRetryDelayMs?: number
  /** Validation timeout before the first retry (default 300) */
  baseValidationTimeoutSeconds?: number
  /** Abort keywords applied to every strategy */
  abortConditions?: readonly string[]
}

export const DEFAULT_LOOP_TIME_CEILING_MS = 60 * 60 * 1000
export const DEFAULT_BASE_RETRY_DELAY_MS = 1000
export const DEFAULT_BASE_VALIDATION_TIMEOUT_SECONDS = 300

// ---------------------------------------------------------------------------
// FeedbackEngine interface
// ---------------------------------------------------------------------------

export interface FeedbackEngine {
  /**
   * Open a loop for (runId, stage, workOrderId), or return the one already open.
   * @throws {MissingStrategyError} if the loop's strategy is not configured
   */
  registerLoop(input: RegisterLoopInput): FeedbackContext

  /**
   * Record a failed validation on an open loop and apply the resulting decision.
   * @throws {FeedbackLoopNotFoundError} if the loop is not active
   */
  processFailure(loopId: LoopId, validation: ValidationResultInput, failureReason?: string): RedirectedDecision

  /**
   * Close a loop as resolved. Returns null when the loop is not active, so
   * repeated calls are harmless.
   */
  processSuccess(loopId: LoopId, validation?: ValidationResultInput): ContinueDecision | null

  /** Decide for a loop's current state without changing anything */
  analyze(context: FeedbackContext, now?: Date): RedirectedDecision

  classifyFailure(record: FailureRecordInput): FailureOrigin

  /**
   * Charge a verifier's failure to the stage that produced the artifact. The
   * verifier's loop stays open; the failure is processed on the producer's loop.
   */
  routeToProducer(input: RouteToProducerInput): RollbackDecision

  renderInstruction(decision: FeedbackDecision): string

  getRunStatus(runId: RunId): RunFeedbackStatus

  getActiveLoops(runId?: RunId): FeedbackContext[]

  cleanup(options?: CleanupOptions): CleanupReport

  getStrategy(key: string): RetryStrategy | undefined
}
