/**
 * Instruction batch rendering.
 *
 * The batch is the document handed to the executor host: a commented header
 * followed by one invocation entry per produced instruction. Entries keep
 * dispatch order; the scheduler never parses a batch back.
 */

import type { DispatchMode } from './types.js'

export interface BatchEntry {
  taskId: string
  executorId: string
  instruction: string
}

export interface BatchHeader {
  runId: string
  mode: DispatchMode
  label?: string
  total: number
  produced: number
  failed: number
  generatedAt: string
}

/** Escape characters that would break the surrounding markup */
export function escapeMarkup(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;')
}

function renderHeader(header: BatchHeader): string[] {
  const lines = [`# Instruction batch ${header.runId}`]
  if (header.label !== undefined) {
    lines.push(`# Stage: ${header.label}`)
  }
  lines.push(`# Mode: ${header.mode}`)
  lines.push(
    `# Work orders: ${String(header.total)}, produced: ${String(header.produced)}, failed: ${String(header.failed)}`,
  )
  lines.push(`# Generated: ${header.generatedAt}`)
  return lines
}

function renderInvoke(entry: BatchEntry): string[] {
  return [
    '  <invoke name="Task">',
    `    <parameter name="subagent_type">${escapeMarkup(entry.executorId)}</parameter>`,
    `    <parameter name="prompt">${escapeMarkup(entry.instruction)}</parameter>`,
    '  </invoke>',
  ]
}

/** A single invocation block for one executor, as used in a batch */
export function renderInvocation(entry: BatchEntry): string {
  return ['<function_calls>', ...renderInvoke(entry), '</function_calls>'].join('\n')
}

/**
 * Render a batch document.
 *
 * Parallel batches place every entry in one invocation block so the host can
 * run them together. Sequential and dependency-graph batches emit one block
 * per step, each preceded by a step comment, since each step depends on the
 * previous result.
 */
export function renderInstructionBatch(header: BatchHeader, entries: readonly BatchEntry[]): string {
  const lines = renderHeader(header)
  if (entries.length === 0) {
    return lines.join('\n') + '\n'
  }
  lines.push('')

  if (header.mode === 'parallel') {
    lines.push('<function_calls>')
    for (const entry of entries) {
      lines.push(...renderInvoke(entry))
    }
    lines.push('</function_calls>')
  } else {
    entries.forEach((entry, i) => {
      if (i > 0) lines.push('')
      lines.push(`# Step ${String(i + 1)}/${String(entries.length)}: ${entry.taskId}`)
      lines.push('<function_calls>')
      lines.push(...renderInvoke(entry))
      lines.push('</function_calls>')
    })
  }

  return lines.join('\n') + '\n'
}
