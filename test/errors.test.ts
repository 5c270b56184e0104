/**
 * Error hierarchy tests
 */

import { describe, it, expect } from 'vitest'
import {
  ConfigurationError,
  DependencyCycleError,
  FeedbackLoopNotFoundError,
  InstructionProductionError,
  InvalidTransitionError,
  MissingStrategyError,
  PersistenceError,
  TaskRelayError,
  UnknownStageError,
} from '../src/core/errors.js'

describe('TaskRelayError', () => {
  it('carries message, code and context', () => {
    const error = new TaskRelayError('Timed out', 'TIMEOUT', { taskId: 'task-1' })
    expect(error.message).toBe('Timed out')
    expect(error.code).toBe('TIMEOUT')
    expect(error.name).toBe('TaskRelayError')
    expect(error.context).toEqual({ taskId: 'task-1' })
    expect(error).toBeInstanceOf(Error)
  })

  it('serializes to JSON', () => {
    const json = new TaskRelayError('Test', 'CODE', { key: 'value' }).toJSON()
    expect(json).toMatchObject({ name: 'TaskRelayError', message: 'Test', code: 'CODE', context: { key: 'value' } })
  })
})

describe('configuration errors', () => {
  it('groups every configuration fault under ConfigurationError', () => {
    const errors = [
      new DependencyCycleError(['a', 'b', 'a']),
      new UnknownStageError('review'),
      new MissingStrategyError('deployment', 'deployment'),
    ]
    for (const error of errors) {
      expect(error).toBeInstanceOf(ConfigurationError)
      expect(error).toBeInstanceOf(TaskRelayError)
    }
    expect(errors.map((e) => e.code)).toEqual(['DEPENDENCY_CYCLE', 'UNKNOWN_STAGE', 'MISSING_STRATEGY'])
  })

  it('defaults the ConfigurationError code', () => {
    expect(new ConfigurationError('Missing field').code).toBe('CONFIGURATION_ERROR')
  })

  it('renders the cycle path', () => {
    const error = new DependencyCycleError(['build', 'test', 'build'])
    expect(error.message).toBe('Circular dependency detected: build -> test -> build')
    expect(error.context).toEqual({ cycle: ['build', 'test', 'build'] })
  })

  it('names the stage and strategy of a missing strategy', () => {
    const error = new MissingStrategyError('review', 'peer_review')
    expect(error.message).toBe('No retry strategy "peer_review" configured for stage "review"')
    expect(error.context).toEqual({ stage: 'review', strategy: 'peer_review' })
  })

  it('merges extra context into an unknown stage error', () => {
    expect(new UnknownStageError('design', { referencedBy: 'build' }).context).toEqual({
      stage: 'design',
      referencedBy: 'build',
    })
  })
})

describe('runtime errors', () => {
  it('are not configuration errors', () => {
    const errors = [
      new InstructionProductionError('producer threw'),
      new PersistenceError('disk full'),
      new FeedbackLoopNotFoundError('loop-1'),
      new InvalidTransitionError('task-1', 'completed', 'dispatched'),
    ]
    for (const error of errors) {
      expect(error).toBeInstanceOf(TaskRelayError)
      expect(error).not.toBeInstanceOf(ConfigurationError)
    }
  })

  it('describes the rejected transition', () => {
    const error = new InvalidTransitionError('task-1', 'completed', 'dispatched')
    expect(error.message).toBe('Invalid work order transition for task-1: completed -> dispatched')
    expect(error.code).toBe('INVALID_TRANSITION')
  })

  it('names the missing loop', () => {
    const error = new FeedbackLoopNotFoundError('loop-7')
    expect(error.message).toBe('Feedback loop not active: loop-7')
    expect(error.context).toEqual({ loopId: 'loop-7' })
  })
})
