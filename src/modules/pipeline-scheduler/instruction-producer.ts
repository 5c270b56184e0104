/**
 * Default instruction producer and sequential carry-over.
 */

import type { WorkOrder, WorkOrderResult } from '../work-order/index.js'
import type { InstructionProducer } from './types.js'

/**
 * Render a work order's description and instruction text as an opaque task
 * brief for its executor.
 */
export const defaultInstructionProducer: InstructionProducer = (order) => {
  const sections = [`## Task ${order.taskId}`, order.description]
  if (order.instructionText.trim() !== '') {
    sections.push('## Instructions', order.instructionText)
  }
  if (order.critical) {
    sections.push('This work order is critical: a failure blocks the stage.')
  }
  return sections.join('\n\n')
}

/** The reported result of a work order, without its own instruction text */
export function reportedResult(order: WorkOrder): WorkOrderResult {
  const result: WorkOrderResult = order.result ?? {}
  const { instruction: _instruction, ...rest } = result
  return {
    taskId: order.taskId,
    executorId: order.executorId,
    status: order.status,
    ...rest,
  }
}

/** Append the preceding work order's reported result to an instruction */
export function appendCarryOver(instruction: string, previous: WorkOrder): string {
  return `${instruction}\n\n## Previous step result\n${JSON.stringify(reportedResult(previous), null, 2)}`
}
