/**
 * Error definitions for taskrelay
 * Structured error hierarchy shared by every module
 */

/** Base error class for all taskrelay errors */
export class TaskRelayError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'TaskRelayError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TaskRelayError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

// ---------------------------------------------------------------------------
// Configuration errors (fatal, never retried)
// ---------------------------------------------------------------------------

/** Error thrown when configuration is invalid, missing or self-contradictory */
export class ConfigurationError extends TaskRelayError {
  constructor(message: string, context: Record<string, unknown> = {}, code = 'CONFIGURATION_ERROR') {
    super(message, code, context)
    this.name = 'ConfigurationError'
  }
}

/** Error thrown when a work-order or stage graph contains a cycle */
export class DependencyCycleError extends ConfigurationError {
  constructor(cycle: string[]) {
    super(`Circular dependency detected: ${cycle.join(' -> ')}`, { cycle }, 'DEPENDENCY_CYCLE')
    this.name = 'DependencyCycleError'
  }
}

/** Error thrown when a stage (or a stage dependency) is not registered */
export class UnknownStageError extends ConfigurationError {
  constructor(stage: string, context: Record<string, unknown> = {}) {
    super(`Unknown stage: ${stage}`, { stage, ...context }, 'UNKNOWN_STAGE')
    this.name = 'UnknownStageError'
  }
}

/** Error thrown when a stage names a retry strategy that is not configured */
export class MissingStrategyError extends ConfigurationError {
  constructor(stage: string, strategy: string) {
    super(
      `No retry strategy "${strategy}" configured for stage "${stage}"`,
      { stage, strategy },
      'MISSING_STRATEGY'
    )
    this.name = 'MissingStrategyError'
  }
}

// ---------------------------------------------------------------------------
// Runtime errors
// ---------------------------------------------------------------------------

/** Error recorded on a single work order when instruction production fails */
export class InstructionProductionError extends TaskRelayError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'INSTRUCTION_PRODUCTION_ERROR', context)
    this.name = 'InstructionProductionError'
  }
}

/** Error raised when a state write or read against the backing store fails */
export class PersistenceError extends TaskRelayError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'PERSISTENCE_ERROR', context)
    this.name = 'PersistenceError'
  }
}

/** Error thrown when a feedback loop id is not in the active set */
export class FeedbackLoopNotFoundError extends TaskRelayError {
  constructor(loopId: string) {
    super(`Feedback loop not active: ${loopId}`, 'FEEDBACK_LOOP_NOT_FOUND', { loopId })
    this.name = 'FeedbackLoopNotFoundError'
  }
}

/** Error thrown when a work order is asked to move backward in its lifecycle */
export class InvalidTransitionError extends TaskRelayError {
  constructor(taskId: string, from: string, to: string) {
    super(`Invalid work order transition for ${taskId}: ${from} -> ${to}`, 'INVALID_TRANSITION', {
      taskId,
      from,
      to,
    })
    this.name = 'InvalidTransitionError'
  }
}
