/**
 * Escalation target selection.
 */

import type { ExecutorId } from '../../core/types.js'
import { normalizeText } from './classification.js'
import type { EscalationPolicy } from './types.js'

/**
 * Pick the executor an escalated loop is handed to.
 *
 * Specialists whose keyword appears in the failure text come first, in
 * declaration order, then the stage default, then each fallback. The
 * current executor is never chosen; null means nobody else is available.
 */
export function selectEscalationTarget(
  policy: EscalationPolicy,
  currentExecutor: ExecutorId,
  failureText: string,
): ExecutorId | null {
  const text = normalizeText(failureText)
  const candidates: ExecutorId[] = []

  for (const [keyword, executor] of Object.entries(policy.specialists)) {
    if (text.includes(normalizeText(keyword))) {
      candidates.push(executor)
    }
  }
  candidates.push(policy.defaultExecutor, ...policy.fallbackExecutors)

  return candidates.find((executor) => executor !== currentExecutor) ?? null
}
