/**
 * Core types for taskrelay
 * Identifier aliases shared by every module
 */

/** Identifier of a work order, unique within one pipeline run */
export type TaskId = string

/** Identifier of an external executor capability */
export type ExecutorId = string

/** Identifier of one orchestrated run (spans every stage) */
export type RunId = string

/** Identifier of a feedback loop */
export type LoopId = string

/** Name of a registered pipeline stage */
export type StageName = string

/** Severity level for log messages */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent'
