/**
 * TaskRelayImpl: concrete implementation of the TaskRelay interface.
 *
 * The createTaskRelay() factory:
 *  1. Loads configuration
 *  2. Creates the state store, feedback engine, scheduler and gate registry
 *  3. Builds the stage registry from the configured overrides
 *  4. Creates the stage orchestrator over all of them
 *  5. Initializes services via ServiceRegistry and expires stale loops
 *  6. Emits relay:ready
 *
 * No module imports another module's implementation; all wiring is here.
 */

import { TaskRelayError } from './errors.js'
import { ServiceRegistry } from './di.js'
import { createEventBus } from './event-bus.js'
import type { TypedEventBus } from './event-bus.js'
import type { TaskRelay, TaskRelayOptions } from './task-relay.js'
import type { RunId, StageName } from './types.js'
import { createConfigSystem, toStrategies } from '../modules/config/index.js'
import type { TaskRelayConfig } from '../modules/config/index.js'
import { createFeedbackEngine } from '../modules/feedback-engine/index.js'
import type { FeedbackEngine, RunFeedbackStatus } from '../modules/feedback-engine/index.js'
import { createPipelineScheduler } from '../modules/pipeline-scheduler/index.js'
import type { PipelineScheduler } from '../modules/pipeline-scheduler/index.js'
import { createGatePipeline, createGateRegistry, createGateValidator } from '../modules/quality-gates/index.js'
import type { GateRegistry } from '../modules/quality-gates/index.js'
import { createStageOrchestrator, createStageRegistry } from '../modules/stage-orchestrator/index.js'
import type { RunRequest, RunResult, StageOrchestrator, StageValidator } from '../modules/stage-orchestrator/index.js'
import { createStateStore } from '../modules/state-store/index.js'
import type { CleanupReport } from '../modules/state-store/index.js'
import { createLogger, setLogLevel } from '../utils/logger.js'

const logger = createLogger('taskrelay')

const HOUR_MS = 60 * 60 * 1000

interface RelayParts {
  eventBus: TypedEventBus
  registry: ServiceRegistry
  config: TaskRelayConfig
  engine: FeedbackEngine
  scheduler: PipelineScheduler
  orchestrator: StageOrchestrator
  gates: GateRegistry
}

// ---------------------------------------------------------------------------
// TaskRelayImpl
// ---------------------------------------------------------------------------

export class TaskRelayImpl implements TaskRelay {
  readonly eventBus: TypedEventBus
  readonly config: TaskRelayConfig
  readonly engine: FeedbackEngine
  readonly scheduler: PipelineScheduler
  readonly orchestrator: StageOrchestrator
  readonly gates: GateRegistry
  private readonly _registry: ServiceRegistry
  private _ready = false
  private _shutdown = false
  private _sigtermHandler: (() => void) | null = null
  private _sigintHandler: (() => void) | null = null

  constructor(parts: RelayParts) {
    this.eventBus = parts.eventBus
    this.config = parts.config
    this.engine = parts.engine
    this.scheduler = parts.scheduler
    this.orchestrator = parts.orchestrator
    this.gates = parts.gates
    this._registry = parts.registry
  }

  get isReady(): boolean {
    return this._ready
  }

  /** Initialize services, expire stale loops and mark the relay ready */
  async start(handleSignals: boolean): Promise<void> {
    // Stops whatever it started before rethrowing
    await this._registry.initializeAll()

    this.cleanup()

    if (handleSignals) {
      this._registerShutdownHandlers()
    }

    this._ready = true
    this.eventBus.emit('relay:ready', { stages: this.orchestrator.getStages().map((s) => s.name) })
    logger.info({ serviceNames: this._registry.serviceNames }, 'taskrelay ready')
  }

  async run(request: RunRequest): Promise<RunResult> {
    if (this._shutdown) {
      throw new TaskRelayError('taskrelay has been shut down', 'RELAY_SHUT_DOWN')
    }
    return this.orchestrator.runPipeline(request)
  }

  getRunStatus(runId: RunId): RunFeedbackStatus {
    return this.engine.getRunStatus(runId)
  }

  cleanup(): CleanupReport {
    return this.engine.cleanup({
      maxActiveAgeMs: this.config.global.loop_max_age_hours * HOUR_MS,
      historyRetentionMs: this.config.global.history_retention_hours * HOUR_MS,
    })
  }

  async shutdown(): Promise<void> {
    if (this._shutdown) return
    this._shutdown = true
    this._ready = false

    logger.info('taskrelay shutdown initiated')
    this.eventBus.emit('relay:shutdown', { reason: 'shutdown() called' })
    this._removeShutdownHandlers()

    try {
      await this._registry.shutdownAll()
    } catch (err) {
      logger.error({ err }, 'Error during taskrelay shutdown')
    }

    logger.info('taskrelay shutdown complete')
  }

  private _registerShutdownHandlers(): void {
    if (this._sigtermHandler !== null) return

    const makeHandler = (signal: string) => () => {
      logger.info({ signal }, 'Received signal, shutting down')
      this.shutdown()
        .then(() => {
          process.exit(0)
        })
        .catch((err: unknown) => {
          logger.error({ err }, 'Error during signal-triggered shutdown')
          process.exit(1)
        })
    }

    this._sigtermHandler = makeHandler('SIGTERM')
    this._sigintHandler = makeHandler('SIGINT')
    process.once('SIGTERM', this._sigtermHandler)
    process.once('SIGINT', this._sigintHandler)
  }

  private _removeShutdownHandlers(): void {
    if (this._sigtermHandler !== null) {
      process.removeListener('SIGTERM', this._sigtermHandler)
      this._sigtermHandler = null
    }
    if (this._sigintHandler !== null) {
      process.removeListener('SIGINT', this._sigintHandler)
      this._sigintHandler = null
    }
  }
}

// ---------------------------------------------------------------------------
// createTaskRelay factory
// ---------------------------------------------------------------------------

/**
 * Build a relay with every module wired from the merged configuration.
 *
 * @throws {ConfigurationError} when configuration is invalid, the stage graph
 *   is unsound or the state store cannot be opened
 */
export async function createTaskRelay(options: TaskRelayOptions = {}): Promise<TaskRelay> {
  const configSystem = options.configSystem ?? createConfigSystem(options.config)
  if (!configSystem.isLoaded) {
    await configSystem.load()
  }
  const config = configSystem.getConfig()
  setLogLevel(config.global.log_level)

  const { global } = config
  logger.info({ stateDbPath: global.state_db_path }, 'Initializing taskrelay')

  const eventBus = options.eventBus ?? createEventBus()
  const now = options.now

  const stateStore = createStateStore({ databasePath: global.state_db_path, now })
  const engine = createFeedbackEngine({
    stateStore,
    strategies: toStrategies(config),
    eventBus,
    now,
    loopTimeCeilingMs: global.loop_time_ceiling_ms,
    baseRetryDelayMs: global.base_retry_delay_ms,
    baseValidationTimeoutSeconds: global.base_validation_timeout_seconds,
    abortConditions: global.abort_conditions,
  })
  const scheduler = createPipelineScheduler({
    workerPoolSize: global.worker_pool_size,
    productionTimeoutMs: global.production_timeout_ms,
    producer: options.producer,
    eventBus,
    now,
  })

  const gates = createGateRegistry(config.quality_gates)
  const gateValidator = createGateValidator(createGatePipeline(gates), options.gateReports)

  const stages = createStageRegistry(config.stages)
  const validators: Record<StageName, StageValidator> = {}
  for (const stage of stages.list()) {
    if (stage.kind === 'gate') {
      validators[stage.name] = gateValidator
    }
  }
  Object.assign(validators, options.validators)

  const orchestrator = createStageOrchestrator({
    engine,
    scheduler,
    stages,
    planners: options.planners,
    validators,
    defaultValidator: options.defaultValidator,
    stageEntryCeiling: global.stage_retry_ceiling,
    eventBus,
    now,
  })

  const registry = new ServiceRegistry()
  registry.register('stateStore', stateStore)

  const relay = new TaskRelayImpl({ eventBus, registry, config, engine, scheduler, orchestrator, gates })
  await relay.start(options.handleSignals ?? false)
  return relay
}
