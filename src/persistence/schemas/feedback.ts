/**
 * Zod schemas for feedback-loop rows as stored in SQLite.
 *
 * JSON columns are kept as text here; queries/feedback-loops.ts converts
 * rows to and from the domain records.
 */

import { z } from 'zod'
import { LoopOutcomeEnum } from '../../modules/state-store/types.js'

export const FeedbackLoopRowSchema = z.object({
  loop_id: z.string(),
  root_loop_id: z.string(),
  run_id: z.string(),
  stage: z.string(),
  executor_id: z.string(),
  work_order_id: z.string(),
  original_instruction: z.string(),
  validation_result: z.string().nullable(),
  failure_reason: z.string(),
  failure_history: z.string(),
  retry_count: z.number().int(),
  max_retries: z.number().int(),
  has_escalated: z.number().int(),
  escalated_from: z.string().nullable(),
  metadata: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
})
export type FeedbackLoopRow = z.infer<typeof FeedbackLoopRowSchema>

export const FeedbackHistoryRowSchema = FeedbackLoopRowSchema.extend({
  id: z.number().int(),
  outcome: LoopOutcomeEnum,
  closed_at: z.string(),
})
export type FeedbackHistoryRow = z.infer<typeof FeedbackHistoryRowSchema>
