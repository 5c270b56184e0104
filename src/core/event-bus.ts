/**
 * TypedEventBus: typed internal pub/sub for decoupled module communication.
 *
 * Built on Node.js EventEmitter. Dispatch is synchronous: every handler runs
 * before emit() returns.
 */

import { EventEmitter } from 'node:events'
import type { RelayEvents } from './event-bus.types.js'

export type RelayEventName = keyof RelayEvents & string

export type RelayEventHandler<K extends RelayEventName> = (payload: RelayEvents[K]) => void

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

export interface TypedEventBus {
  emit<K extends RelayEventName>(event: K, payload: RelayEvents[K]): void
  on<K extends RelayEventName>(event: K, handler: RelayEventHandler<K>): void
  /** No-op when the handler was never registered */
  off<K extends RelayEventName>(event: K, handler: RelayEventHandler<K>): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('stage:completed', ({ stage }) => {
 *   console.log(`Stage ${stage} done`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
    this._emitter.setMaxListeners(100)
  }

  emit<K extends RelayEventName>(event: K, payload: RelayEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends RelayEventName>(event: K, handler: RelayEventHandler<K>): void {
    this._emitter.on(event, handler)
  }

  off<K extends RelayEventName>(event: K, handler: RelayEventHandler<K>): void {
    this._emitter.off(event, handler)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
