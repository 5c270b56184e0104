export type { StateStore } from './state-store.js'
export { StateStoreImpl, createStateStore } from './state-store-impl.js'
export type {
  CleanupOptions,
  CleanupReport,
  FailureSnapshot,
  FeedbackContext,
  FeedbackHistoryEntry,
  LoopFilter,
  LoopKey,
  LoopOutcome,
  StateStoreOptions,
} from './types.js'
export {
  DEFAULT_HISTORY_RETENTION_MS,
  DEFAULT_LOOP_MAX_AGE_MS,
  FeedbackContextSchema,
  FeedbackHistoryEntrySchema,
  LoopOutcomeEnum,
} from './types.js'
