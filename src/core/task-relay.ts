/**
 * TaskRelay interface: the public contract of a fully wired relay.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createTaskRelay()` from task-relay-impl.ts.
 */

import type { TypedEventBus } from './event-bus.js'
import type { RunId, StageName } from './types.js'
import type { ConfigSystem, ConfigSystemOptions, TaskRelayConfig } from '../modules/config/index.js'
import type { FeedbackEngine, RunFeedbackStatus } from '../modules/feedback-engine/index.js'
import type { PipelineScheduler, InstructionProducer } from '../modules/pipeline-scheduler/index.js'
import type { GateRegistry, GateReportSource } from '../modules/quality-gates/index.js'
import type {
  RunRequest,
  RunResult,
  StageOrchestrator,
  StagePlanner,
  StageValidator,
} from '../modules/stage-orchestrator/index.js'
import type { CleanupReport } from '../modules/state-store/index.js'

// ---------------------------------------------------------------------------
// TaskRelayOptions
// ---------------------------------------------------------------------------

export interface TaskRelayOptions {
  /** A prepared config system; loaded here if it is not loaded yet */
  configSystem?: ConfigSystem

  /** Used to create a config system when `configSystem` is omitted */
  config?: ConfigSystemOptions

  /** Turns a work order into its executor instruction */
  producer?: InstructionProducer

  planners?: Readonly<Record<StageName, StagePlanner>>

  /**
   * Per-stage validators. Gate stages get a quality gate validator unless
   * one is given here.
   */
  validators?: Readonly<Record<StageName, StageValidator>>

  defaultValidator?: StageValidator

  /** Where gate stages read their reports (default: `result.gates`) */
  gateReports?: GateReportSource

  eventBus?: TypedEventBus

  now?: () => Date

  /**
   * Shut down on SIGTERM/SIGINT and exit the process.
   * @default false
   */
  handleSignals?: boolean
}

// ---------------------------------------------------------------------------
// TaskRelay interface
// ---------------------------------------------------------------------------

/**
 * Lifecycle:
 *  1. Create via `createTaskRelay(options)`; config is loaded, the state
 *     store initialized and stale loops expired
 *  2. `relay:ready` is emitted
 *  3. Call `run()` for each pipeline request
 *  4. Call `shutdown()` to close the state store
 */
export interface TaskRelay {
  readonly eventBus: TypedEventBus

  /** The merged configuration the relay was built from */
  readonly config: TaskRelayConfig

  readonly engine: FeedbackEngine
  readonly scheduler: PipelineScheduler
  readonly orchestrator: StageOrchestrator
  readonly gates: GateRegistry

  readonly isReady: boolean

  /**
   * Run one pipeline request.
   * @throws {TaskRelayError} with code RELAY_SHUT_DOWN after `shutdown()`
   */
  run(request: RunRequest): Promise<RunResult>

  getRunStatus(runId: RunId): RunFeedbackStatus

  /** Expire and prune loops using the configured retention */
  cleanup(): CleanupReport

  /**
   * Shut down every service in reverse initialization order.
   * Safe to call multiple times.
   */
  shutdown(): Promise<void>
}
