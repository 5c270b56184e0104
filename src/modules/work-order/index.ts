export type { WorkOrder, WorkOrderInput, WorkOrderResult, WorkOrderStatus } from './types.js'
export { WorkOrderInputSchema, WorkOrderStatusEnum, DEFAULT_WORK_ORDER_TIMEOUT_MS } from './types.js'
export {
  createWorkOrder,
  transitionWorkOrder,
  canTransition,
  isTerminalStatus,
  markDispatched,
  markCompleted,
  markFailed,
  markCancelled,
} from './work-order.js'
export type { TransitionPatch } from './work-order.js'
