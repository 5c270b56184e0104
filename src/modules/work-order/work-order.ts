/**
 * WorkOrder construction and lifecycle transitions.
 *
 * Lifecycle:
 *   pending -> dispatched -> completed | failed
 *   pending | dispatched -> cancelled
 *
 * Terminal states (completed, failed, cancelled) accept no further transition.
 */

import { InvalidTransitionError } from '../../core/errors.js'
import { WorkOrderInputSchema } from './types.js'
import type { WorkOrder, WorkOrderInput, WorkOrderResult, WorkOrderStatus } from './types.js'

// ---------------------------------------------------------------------------
// Transition table
// ---------------------------------------------------------------------------

const ALLOWED_TRANSITIONS: Readonly<Record<WorkOrderStatus, readonly WorkOrderStatus[]>> = {
  pending: ['dispatched', 'cancelled'],
  dispatched: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
}

export function isTerminalStatus(status: WorkOrderStatus): boolean {
  return ALLOWED_TRANSITIONS[status].length === 0
}

export function canTransition(from: WorkOrderStatus, to: WorkOrderStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to)
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/**
 * Validate raw input and build a pending WorkOrder.
 * @throws {ZodError} when the input does not satisfy WorkOrderInputSchema
 */
export function createWorkOrder(input: WorkOrderInput): WorkOrder {
  const parsed = WorkOrderInputSchema.parse(input)
  return {
    taskId: parsed.taskId,
    executorId: parsed.executorId,
    description: parsed.description,
    instructionText: parsed.instructionText,
    dependencies: new Set(parsed.dependencies),
    timeoutMs: parsed.timeoutMs,
    critical: parsed.critical,
    status: 'pending',
    ...(parsed.result !== undefined ? { result: parsed.result } : {}),
  }
}

// ---------------------------------------------------------------------------
// Transitions
// ---------------------------------------------------------------------------

export interface TransitionPatch {
  result?: WorkOrderResult
  error?: string
  /** Timestamp of the transition; defaults to now */
  at?: string
}

/**
 * Move a work order to a new status, returning a new object.
 * @throws {InvalidTransitionError} when the move is not forward in the lifecycle
 */
export function transitionWorkOrder(
  order: WorkOrder,
  to: WorkOrderStatus,
  patch: TransitionPatch = {},
): WorkOrder {
  if (!canTransition(order.status, to)) {
    throw new InvalidTransitionError(order.taskId, order.status, to)
  }
  const at = patch.at ?? new Date().toISOString()
  return {
    ...order,
    status: to,
    ...(patch.result !== undefined ? { result: patch.result } : {}),
    ...(patch.error !== undefined ? { error: patch.error } : {}),
    ...(to === 'dispatched' ? { startedAt: at } : {}),
    ...(isTerminalStatus(to) ? { endedAt: at } : {}),
  }
}

export function markDispatched(order: WorkOrder, at?: string): WorkOrder {
  return transitionWorkOrder(order, 'dispatched', { at })
}

export function markCompleted(order: WorkOrder, result: WorkOrderResult, at?: string): WorkOrder {
  return transitionWorkOrder(order, 'completed', { result, at })
}

export function markFailed(order: WorkOrder, error: string, at?: string): WorkOrder {
  return transitionWorkOrder(order, 'failed', { error, at })
}

export function markCancelled(order: WorkOrder, at?: string): WorkOrder {
  return transitionWorkOrder(order, 'cancelled', { at })
}
