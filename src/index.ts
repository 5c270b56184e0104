/**
 * taskrelay: main module exports
 */

// Core types, errors and infrastructure
export * from './core/types.js'
export * from './core/errors.js'
export { ServiceRegistry } from './core/di.js'
export type { BaseService } from './core/di.js'
export { TypedEventBusImpl, createEventBus } from './core/event-bus.js'
export type { TypedEventBus, RelayEventName, RelayEventHandler } from './core/event-bus.js'
export type { RelayEvents, FeedbackActionName, LoopOutcomeName } from './core/event-bus.types.js'

// Utilities
export { createLogger, childLogger, logger, setLogLevel } from './utils/logger.js'
export * from './utils/helpers.js'

// Composition root
export { TaskRelayImpl, createTaskRelay } from './core/task-relay-impl.js'
export type { TaskRelay, TaskRelayOptions } from './core/task-relay.js'

// Modules
export * from './modules/work-order/index.js'
export * from './modules/pipeline-scheduler/index.js'
export * from './modules/state-store/index.js'
export * from './modules/feedback-engine/index.js'
export * from './modules/quality-gates/index.js'
export * from './modules/stage-orchestrator/index.js'
export * from './modules/config/index.js'
