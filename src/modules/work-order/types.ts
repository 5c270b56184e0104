/**
 * WorkOrder data model.
 *
 * A WorkOrder is an immutable value: every status change produces a new
 * object through the transition helpers in work-order.ts.
 */

import { z } from 'zod'
import type { ExecutorId, TaskId } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

export const WorkOrderStatusEnum = z.enum(['pending', 'dispatched', 'completed', 'failed', 'cancelled'])
export type WorkOrderStatus = z.infer<typeof WorkOrderStatusEnum>

/** Opaque result reported for a work order */
export type WorkOrderResult = Readonly<Record<string, unknown>>

// ---------------------------------------------------------------------------
// WorkOrder
// ---------------------------------------------------------------------------

export interface WorkOrder {
  readonly taskId: TaskId
  readonly executorId: ExecutorId
  readonly description: string
  /** Free-form instruction text; treated as opaque */
  readonly instructionText: string
  /** Ids of work orders that must precede this one; order is irrelevant */
  readonly dependencies: ReadonlySet<TaskId>
  readonly timeoutMs: number
  readonly critical: boolean
  readonly status: WorkOrderStatus
  readonly result?: WorkOrderResult
  readonly error?: string
  /** ISO-8601 timestamps */
  readonly startedAt?: string
  readonly endedAt?: string
}

// ---------------------------------------------------------------------------
// Input schema
// ---------------------------------------------------------------------------

/** Default executor timeout carried on a work order (5 minutes) */
export const DEFAULT_WORK_ORDER_TIMEOUT_MS = 300_000

export const WorkOrderInputSchema = z
  .object({
    taskId: z.string().min(1),
    executorId: z.string().min(1),
    description: z.string().min(1),
    instructionText: z.string().default(''),
    dependencies: z.array(z.string().min(1)).default([]),
    timeoutMs: z.number().int().positive().default(DEFAULT_WORK_ORDER_TIMEOUT_MS),
    critical: z.boolean().default(false),
    result: z.record(z.unknown()).optional(),
  })
  .strict()

/** Shape accepted by createWorkOrder (defaults applied on parse) */
export type WorkOrderInput = z.input<typeof WorkOrderInputSchema>
