/**
 * Tests for StageOrchestratorImpl: stage sequencing, terminal failures,
 * cross-stage rollback, the entry ceiling and gate remediation.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { createStageOrchestrator, StageRegistry } from '../index.js'
import type { StageDefinition, StageOrchestrator, StageValidator } from '../index.js'
import { createFeedbackEngine } from '../../feedback-engine/index.js'
import type { FeedbackEngine, RetryStrategy, StrategyMap } from '../../feedback-engine/index.js'
import { createPipelineScheduler } from '../../pipeline-scheduler/index.js'
import type { PipelineScheduler } from '../../pipeline-scheduler/index.js'
import { createStateStore } from '../../state-store/index.js'
import type { StateStore } from '../../state-store/index.js'
import { createGatePipeline, createGateRegistry, createGateValidator } from '../../quality-gates/index.js'
import { createEventBus } from '../../../core/event-bus.js'
import type { TypedEventBus } from '../../../core/event-bus.js'
import { DependencyCycleError, MissingStrategyError, UnknownStageError } from '../../../core/errors.js'

const NOW = new Date('2026-06-01T12:00:00.000Z')

function makeStrategy(overrides: Partial<RetryStrategy> = {}): RetryStrategy {
  return {
    maxAttempts: 3,
    backoffFactor: 1,
    timeoutMultiplier: 1.5,
    escalationThreshold: 2,
    abortConditions: ['invalid_imports'],
    remediationHints: {},
    guidance: [],
    successCriteria: {},
    escalation: { specialists: {}, defaultExecutor: 'backend-architect', fallbackExecutors: [] },
    ...overrides,
  }
}

const STRATEGIES: StrategyMap = {
  implementation: makeStrategy(),
  testing: makeStrategy({
    maxAttempts: 4,
    escalationThreshold: 3,
    abortConditions: ['test_framework_error'],
    escalation: { specialists: {}, defaultExecutor: 'test-engineer', fallbackExecutors: ['qa-lead'] },
  }),
  quality_gate: makeStrategy({
    maxAttempts: 2,
    escalationThreshold: 1,
    abortConditions: ['performance_regression'],
    escalation: {
      specialists: { security: 'security-auditor' },
      defaultExecutor: 'code-reviewer',
      fallbackExecutors: ['backend-architect'],
    },
  }),
  integration: makeStrategy(),
  deployment: makeStrategy({ maxAttempts: 2, escalationThreshold: 1 }),
}

function productionStage(name: string, dependencies: string[]): StageDefinition {
  return {
    name,
    description: `Run ${name}`,
    kind: 'production',
    dependencies,
    dispatchMode: 'sequential',
    strategy: 'implementation',
    defaultExecutor: 'backend-developer',
  }
}

describe('StageOrchestrator', () => {
  let store: StateStore
  let engine: FeedbackEngine
  let scheduler: PipelineScheduler
  let bus: TypedEventBus
  let stageEvents: string[]

  beforeEach(async () => {
    store = createStateStore({ now: () => NOW })
    await store.initialize()
    engine = createFeedbackEngine({ stateStore: store, strategies: STRATEGIES, now: () => NOW })
    scheduler = createPipelineScheduler({ now: () => NOW })
    bus = createEventBus()
    stageEvents = []
    bus.on('stage:started', ({ stage }) => stageEvents.push(`started:${stage}`))
    bus.on('stage:completed', ({ stage }) => stageEvents.push(`completed:${stage}`))
    bus.on('stage:suspended', ({ stage }) => stageEvents.push(`suspended:${stage}`))
    bus.on('stage:failed', ({ stage, reason }) => stageEvents.push(`failed:${stage}:${reason}`))
  })

  afterEach(async () => {
    await store.shutdown()
  })

  function orchestrator(
    options: { stages?: StageRegistry; validators?: Record<string, StageValidator>; engine?: FeedbackEngine } = {},
  ): StageOrchestrator {
    return createStageOrchestrator({
      engine: options.engine ?? engine,
      scheduler,
      eventBus: bus,
      now: () => NOW,
      ...(options.stages !== undefined ? { stages: options.stages } : {}),
      ...(options.validators !== undefined ? { validators: options.validators } : {}),
    })
  }

  // -------------------------------------------------------------------------
  // Happy path
  // -------------------------------------------------------------------------

  it('runs every built-in stage once when all validation passes', async () => {
    const result = await orchestrator().runPipeline({ runId: 'run-ok', task: 'Add a cart total endpoint' })

    expect(result.status).toBe('completed')
    expect(result.requiresManualIntervention).toBe(false)
    expect(result.stages.map((s) => [s.stage, s.status, s.entries])).toEqual([
      ['implementation', 'completed', 1],
      ['testing', 'completed', 1],
      ['quality_validation', 'completed', 1],
      ['integration', 'completed', 1],
      ['deployment', 'completed', 1],
    ])
    expect(result.remediationInstructions).toEqual([])
    expect(result.nextSteps).toEqual([])
    expect(result.feedbackSummary.activeLoops).toBe(0)
    expect(result.feedbackSummary.successRate).toBe(1)
  })

  it('hands a verification stage the result of the stage it verifies', async () => {
    const seen: string[] = []
    await orchestrator({
      validators: {
        testing: (order) => {
          seen.push(order.taskId, order.instructionText.split('\n')[0] ?? '')
          return { success: true }
        },
      },
    }).runPipeline({ task: 'Add a cart total endpoint', stages: ['implementation', 'testing'] })

    expect(seen).toEqual([
      'testing:implementation',
      'Verify the work delivered for implementation by fullstack-engineer.',
    ])
  })

  // -------------------------------------------------------------------------
  // Terminal failure
  // -------------------------------------------------------------------------

  it('stops at an aborted stage and leaves later stages pending', async () => {
    const stages = new StageRegistry([
      productionStage('design', []),
      productionStage('build', ['design']),
      productionStage('ship', ['build']),
    ])
    const result = await orchestrator({
      stages,
      validators: { build: () => ({ success: false, failures: [{ type: 'invalid_imports', message: 'cannot resolve ./db' }] }) },
    }).runPipeline({ task: 'Ship the exporter', stages: ['design', 'build', 'ship'] })

    expect(result.stages.map((s) => s.status)).toEqual(['completed', 'failed', 'pending'])
    expect(result.stages[1]?.failureKind).toBe('no_recourse')
    expect(result.status).toBe('failed')
    expect(result.requiresManualIntervention).toBe(true)
    expect(result.failedStage).toBe('build')
    expect(result.remediationInstructions).toHaveLength(1)
    expect(result.remediationInstructions[0]?.startsWith('# Feedback decision: abort')).toBe(true)
    expect(result.nextSteps[0]).toBe('Resolve the condition that aborted the build stage by hand.')
    expect(stageEvents).toEqual(['started:design', 'completed:design', 'started:build', 'failed:build:no_recourse'])
  })

  it('retries a failed work order with the remediation instruction', async () => {
    const build = vi
      .fn<StageValidator>()
      .mockReturnValueOnce({ success: false, failures: [{ type: 'syntax_error', message: 'unexpected token' }] })
      .mockReturnValue({ success: true })
    const stages = new StageRegistry([productionStage('build', [])])

    const result = await orchestrator({ stages, validators: { build } }).runPipeline({ task: 'Parse the manifest', stages: ['build'] })

    expect(result.status).toBe('completed')
    expect(result.stages[0]?.entries).toBe(2)
    expect(result.stages[0]?.retryCount).toBe(1)
    const second = build.mock.calls[1]?.[0]
    expect(second?.executorId).toBe('backend-developer')
    expect(second?.instructionText.startsWith('## Previous attempt failed')).toBe(true)
  })

  // -------------------------------------------------------------------------
  // Cross-stage rollback
  // -------------------------------------------------------------------------

  it('sends an artifact defect found in testing back to the implementation executor', async () => {
    const implementation = vi.fn<StageValidator>().mockReturnValue({ success: true })
    const testing = vi
      .fn<StageValidator>()
      .mockReturnValueOnce({
        success: false,
        failures: [{ type: 'test_failure', message: 'total mismatch', expected: 40, actual: 38 }],
      })
      .mockReturnValue({ success: true })

    const result = await orchestrator({ validators: { implementation, testing } }).runPipeline({
      runId: 'run-c',
      task: 'Add a cart total endpoint',
      stages: ['implementation', 'testing'],
    })

    expect(result.status).toBe('completed')
    expect(stageEvents).toEqual([
      'started:implementation',
      'completed:implementation',
      'started:testing',
      'suspended:testing',
      'started:implementation',
      'completed:implementation',
      'started:testing',
      'completed:testing',
    ])

    const redispatched = implementation.mock.calls[1]?.[0]
    expect(redispatched?.executorId).toBe('fullstack-engineer')
    expect(redispatched?.instructionText.startsWith('## Previous attempt failed')).toBe(true)
    expect(testing.mock.calls.map(([order]) => order.executorId)).toEqual(['test-engineer', 'test-engineer'])

    expect(result.feedbackSummary.activeLoops).toBe(0)
    expect(result.feedbackSummary.recentHistory.filter((h) => h.stage === 'implementation')).toHaveLength(2)
  })

  describe('rollback alongside other decisions in the same batch', () => {
    const producers = {
      implementation: [
        { taskId: 'impl-a', executorId: 'dev', description: 'Build the cart total', instructionText: 'Build A' },
        { taskId: 'impl-b', executorId: 'dev', description: 'Build the tax lookup', instructionText: 'Build B' },
      ],
    }

    function testingValidator() {
      const seen = new Set<string>()
      return vi.fn<StageValidator>((order) => {
        const first = !seen.has(order.taskId)
        seen.add(order.taskId)
        if (!first) return { success: true }
        if (order.taskId === 'testing:impl-a') {
          return { success: false, failures: [{ type: 'test_failure', message: 'total mismatch', expected: 1, actual: 2 }] }
        }
        return { success: false, failures: [{ type: 'mock_error', message: 'stub missing' }] }
      })
    }

    function callsFor(validator: ReturnType<typeof testingValidator>, taskId: string) {
      return validator.mock.calls.map(([order]) => order).filter((order) => order.taskId === taskId)
    }

    it('keeps the retry instruction of a sibling work order', async () => {
      const implementation = vi.fn<StageValidator>().mockReturnValue({ success: true })
      const testing = testingValidator()

      const result = await orchestrator({ validators: { implementation, testing } }).runPipeline({
        task: 'Price the cart',
        stages: ['implementation', 'testing'],
        workOrders: producers,
      })

      expect(result.status).toBe('completed')
      expect(implementation.mock.calls.map(([order]) => order.taskId)).toEqual(['impl-a', 'impl-b', 'impl-a'])

      const sibling = callsFor(testing, 'testing:impl-b')
      expect(sibling).toHaveLength(2)
      expect(sibling[1]?.executorId).toBe('test-engineer')
      expect(sibling[1]?.instructionText.startsWith('## Previous attempt failed')).toBe(true)

      const rolledBack = callsFor(testing, 'testing:impl-a')
      expect(rolledBack[1]?.instructionText.startsWith('Verify the work delivered for impl-a by dev.')).toBe(true)
      expect(result.feedbackSummary.activeLoops).toBe(0)
    })

    it('keeps the escalation target of a sibling work order', async () => {
      const eager = createFeedbackEngine({
        stateStore: store,
        strategies: {
          ...STRATEGIES,
          testing: makeStrategy({
            maxAttempts: 4,
            escalationThreshold: 1,
            escalation: { specialists: {}, defaultExecutor: 'test-engineer', fallbackExecutors: ['qa-lead'] },
          }),
        },
        now: () => NOW,
      })
      const testing = testingValidator()

      const result = await orchestrator({ engine: eager, validators: { testing } }).runPipeline({
        task: 'Price the cart',
        stages: ['implementation', 'testing'],
        workOrders: producers,
      })

      expect(result.status).toBe('completed')
      expect(callsFor(testing, 'testing:impl-b').map((order) => order.executorId)).toEqual(['test-engineer', 'qa-lead'])
      expect(callsFor(testing, 'testing:impl-a').map((order) => order.executorId)).toEqual([
        'test-engineer',
        'test-engineer',
      ])
      expect(result.stages[1]?.loopIds).toHaveLength(3)
      expect(result.feedbackSummary.activeLoops).toBe(0)
    })
  })

  it('fails the verifier with no recourse when the redirected producer decision aborts', async () => {
    const implementation = vi.fn<StageValidator>().mockReturnValue({ success: true })
    const testing = vi.fn<StageValidator>().mockReturnValue({
      success: false,
      failures: [{ type: 'invalid_imports', message: 'cannot resolve ./cart', expected: 'resolved', actual: 'missing' }],
    })

    const result = await orchestrator({ validators: { implementation, testing } }).runPipeline({
      task: 'Price the cart',
      stages: ['implementation', 'testing'],
    })

    expect(result.status).toBe('failed')
    expect(result.failedStage).toBe('testing')
    expect(result.stages.map((s) => [s.stage, s.status, s.failureKind])).toEqual([
      ['implementation', 'completed', undefined],
      ['testing', 'failed', 'no_recourse'],
    ])
    expect(implementation).toHaveBeenCalledOnce()
    expect(stageEvents).toEqual([
      'started:implementation',
      'completed:implementation',
      'started:testing',
      'failed:testing:no_recourse',
    ])
    expect(result.remediationInstructions).toHaveLength(1)
    expect(result.remediationInstructions[0]?.startsWith('# Feedback decision: rollback')).toBe(true)
    expect(result.remediationInstructions[0]).toContain('# Redirected decision: abort')
  })

  // -------------------------------------------------------------------------
  // Entry ceiling
  // -------------------------------------------------------------------------

  it('fails with unresolved loops once the entry ceiling is reached', async () => {
    const result = await orchestrator({
      validators: { testing: () => ({ success: false, failures: [{ type: 'mock_error', message: 'stub missing' }] }) },
    }).runPipeline({ task: 'Cover the exporter', preset: 'testing_only' })

    const testing = result.stages[0]
    expect(testing?.status).toBe('failed')
    expect(testing?.failureKind).toBe('unresolved_loops')
    expect(testing?.entries).toBe(3)
    expect(testing?.loopIds).toHaveLength(2)
    expect(result.remediationInstructions).toHaveLength(1)
    expect(result.remediationInstructions[0]?.startsWith('# Feedback decision: escalate')).toBe(true)
    expect(result.feedbackSummary.activeLoops).toBe(1)
    expect(result.nextSteps).toEqual([
      'The testing stage reached its entry ceiling with loops still open.',
      'Hand the 1 remediation instruction(s) to their executors.',
      'Start a new run from the testing stage once the work passes validation.',
    ])
  })

  // -------------------------------------------------------------------------
  // Quality gates
  // -------------------------------------------------------------------------

  it('dispatches a fix work order to the executor that owns a failing gate', async () => {
    const registry = createGateRegistry({
      passing_score: 8,
      default_executor: 'code-reviewer',
      executors: { security: 'security-auditor' },
    })
    const reports = [
      [{ gate: 'security', status: 'blocked', score: 3, message: 'Hardcoded credential' }],
      [{ gate: 'security', status: 'passed', score: 9 }],
    ]
    const checkGates = createGateValidator(createGatePipeline(registry), () => reports.shift())
    const dispatched: string[][] = []

    const result = await orchestrator({
      validators: {
        quality_validation: (order, context) => {
          dispatched.push(context.run.workOrders.map((o) => `${o.taskId}@${o.executorId}`))
          return checkGates(order)
        },
      },
    }).runPipeline({ task: 'Review the exporter', preset: 'quality_only' })

    expect(result.status).toBe('completed')
    expect(dispatched).toEqual([
      ['quality_validation@code-reviewer'],
      ['quality_validation:fix-security-1@security-auditor', 'quality_validation@security-auditor'],
    ])
  })

  // -------------------------------------------------------------------------
  // Configuration errors
  // -------------------------------------------------------------------------

  describe('configuration errors', () => {
    it('rejects an unknown stage', async () => {
      await expect(orchestrator().runPipeline({ task: 'x', stages: ['review'] })).rejects.toBeInstanceOf(UnknownStageError)
    })

    it('rejects a stage dependency cycle before dispatching anything', async () => {
      const dispatch = vi.spyOn(scheduler, 'dispatch')
      const stages = new StageRegistry([productionStage('a', ['b']), productionStage('b', ['a'])])

      await expect(orchestrator({ stages }).runPipeline({ task: 'x', stages: ['a'] })).rejects.toBeInstanceOf(
        DependencyCycleError,
      )
      expect(dispatch).not.toHaveBeenCalled()
    })

    it('rejects a stage whose strategy is not configured', async () => {
      const { deployment: _deployment, ...partial } = STRATEGIES
      const narrow = createFeedbackEngine({ stateStore: store, strategies: partial, now: () => NOW })
      const dispatch = vi.spyOn(scheduler, 'dispatch')

      await expect(orchestrator({ engine: narrow }).runPipeline({ task: 'x' })).rejects.toThrow(
        'No retry strategy "deployment" configured for stage "deployment"',
      )
      await expect(orchestrator({ engine: narrow }).runPipeline({ task: 'x' })).rejects.toBeInstanceOf(
        MissingStrategyError,
      )
      expect(dispatch).not.toHaveBeenCalled()
    })
  })
})
