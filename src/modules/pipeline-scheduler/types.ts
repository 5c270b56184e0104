/**
 * Types for the Pipeline Scheduler.
 */

import { z } from 'zod'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { RunId } from '../../core/types.js'
import type { WorkOrder } from '../work-order/index.js'

// ---------------------------------------------------------------------------
// Dispatch mode
// ---------------------------------------------------------------------------

export const DispatchModeEnum = z.enum(['parallel', 'sequential', 'dependency_graph'])
export type DispatchMode = z.infer<typeof DispatchModeEnum>

// ---------------------------------------------------------------------------
// Instruction production
// ---------------------------------------------------------------------------

/** Context handed to an InstructionProducer for one work order */
export interface ProductionContext {
  runId: RunId
  mode: DispatchMode
  /** Zero-based position of the work order in dispatch order */
  position: number
  /** Stage or caller label, when the dispatch belongs to a stage */
  label?: string
}

/**
 * Builds the instruction text for one work order. Must not perform the work
 * itself. A thrown error or rejected promise fails only this work order.
 */
export type InstructionProducer = (
  order: WorkOrder,
  context: ProductionContext,
) => string | Promise<string>

// ---------------------------------------------------------------------------
// PipelineRun
// ---------------------------------------------------------------------------

export type PipelineRunStatus = 'completed' | 'failed'

/** Outcome of one scheduler invocation; frozen once dispatch completes */
export interface PipelineRun {
  readonly runId: RunId
  readonly mode: DispatchMode
  readonly label?: string
  readonly status: PipelineRunStatus
  /** Work orders in dispatch order (topological order for dependency_graph) */
  readonly workOrders: readonly WorkOrder[]
  readonly elapsedMs: number
  readonly successCount: number
  readonly failureCount: number
  /** Rendered instruction batch document (opaque output) */
  readonly instructionBatch: string
  readonly generatedAt: string
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface DispatchOptions {
  /** Run id to stamp on the PipelineRun; generated when omitted */
  runId?: RunId
  /** Stage or caller label included in the batch header */
  label?: string
}

export interface PipelineSchedulerOptions {
  /** Maximum concurrent production units in parallel mode (default 10) */
  workerPoolSize?: number
  /** Safety-net timeout per production unit in ms (default 30000) */
  productionTimeoutMs?: number
  /** Instruction producer; defaults to defaultInstructionProducer */
  producer?: InstructionProducer
  /** Receives pipeline:dispatched and workorder:failed events */
  eventBus?: TypedEventBus
  /** Clock, injectable for tests */
  now?: () => Date
}

export const DEFAULT_WORKER_POOL_SIZE = 10
export const DEFAULT_PRODUCTION_TIMEOUT_MS = 30_000
