/**
 * PipelineScheduler: turns a set of WorkOrders plus a dispatch mode into an
 * instruction batch and per-work-order outcomes.
 */

import type { WorkOrder } from '../work-order/index.js'
import type { DispatchMode, DispatchOptions, PipelineRun } from './types.js'

export interface PipelineScheduler {
  /**
   * Produce every instruction independently on a bounded pool. A failure is
   * recorded on its own work order only; the batch keeps input order.
   */
  dispatchParallel(orders: readonly WorkOrder[], options?: DispatchOptions): Promise<PipelineRun>

  /**
   * Produce instructions one by one in declared order, appending the previous
   * work order's reported result to each. Stops at the first failure; the
   * remaining work orders stay pending.
   */
  dispatchSequential(orders: readonly WorkOrder[], options?: DispatchOptions): Promise<PipelineRun>

  /**
   * Sort by declared dependencies, then run as a sequential pipeline.
   * @throws {ConfigurationError} for a cyclic graph or an unknown dependency,
   *   before any work order is touched
   */
  dispatchDependencyGraph(orders: readonly WorkOrder[], options?: DispatchOptions): Promise<PipelineRun>

  /** Dispatch under the given mode */
  dispatch(mode: DispatchMode, orders: readonly WorkOrder[], options?: DispatchOptions): Promise<PipelineRun>
}
