/**
 * Default stage planning.
 *
 * Explicit work orders from the request win. Otherwise a production or gate
 * stage gets one work order for the whole task, and a verification stage
 * gets one work order per completed work order of the stage it verifies,
 * carrying that work order's instruction and reported result.
 */

import type { TaskId } from '../../core/types.js'
import { reportedResult } from '../pipeline-scheduler/index.js'
import type { WorkOrder, WorkOrderInput } from '../work-order/index.js'
import type { PlanContext, PlannedWorkOrder, StagePlanner } from './types.js'

/** Task id of the verification work order for a producer work order */
export function verificationTaskId(stage: string, producerTaskId: TaskId): TaskId {
  return `${stage}:${producerTaskId}`
}

/** Instruction text for verifying one delivered work order */
export function buildUpstreamContext(producer: WorkOrder): string {
  const task = producer.instructionText.trim() !== '' ? producer.instructionText : producer.description
  return [
    `Verify the work delivered for ${producer.taskId} by ${producer.executorId}.`,
    '',
    '## Original task',
    task,
    '',
    '## Delivered result',
    JSON.stringify(reportedResult(producer), null, 2),
  ].join('\n')
}

function producerOrders(context: PlanContext): WorkOrder[] {
  const verifies = context.stage.verifies
  if (verifies === undefined) return []
  return context.upstream.get(verifies)?.workOrders ?? []
}

/**
 * Find the producer work order an explicitly listed verification order checks:
 * by the `<stage>:<taskId>` naming, or the only producer order there is.
 */
function inferVerified(input: WorkOrderInput, stage: string, producers: readonly WorkOrder[]): TaskId | undefined {
  const prefix = `${stage}:`
  if (input.taskId.startsWith(prefix)) {
    const id = input.taskId.slice(prefix.length)
    if (producers.some((p) => p.taskId === id)) return id
  }
  return producers.length === 1 ? producers[0].taskId : undefined
}

export const defaultStagePlanner: StagePlanner = (context) => {
  const { stage, request } = context
  const producers = stage.kind === 'verification' ? producerOrders(context) : []

  const explicit = request.workOrders?.[stage.name]
  if (explicit !== undefined) {
    return explicit.map((input): PlannedWorkOrder => {
      const verifies = stage.kind === 'verification' ? inferVerified(input, stage.name, producers) : undefined
      return verifies !== undefined ? { input, verifies } : { input }
    })
  }

  if (producers.length > 0) {
    return producers.map((producer) => ({
      input: {
        taskId: verificationTaskId(stage.name, producer.taskId),
        executorId: stage.defaultExecutor,
        description: `${stage.description} for ${producer.taskId}`,
        instructionText: buildUpstreamContext(producer),
        critical: producer.critical,
      },
      verifies: producer.taskId,
    }))
  }

  return [
    {
      input: {
        taskId: stage.name,
        executorId: stage.defaultExecutor,
        description: `${stage.description}: ${request.task}`,
        instructionText: request.task,
      },
    },
  ]
}
