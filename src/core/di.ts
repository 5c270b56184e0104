/**
 * Lifecycle for the parts of taskrelay that hold resources.
 *
 * Today only the state store (its SQLite handle) registers here; the engine,
 * scheduler and orchestrator are plain objects wired by constructor injection.
 */

import { createLogger } from '../utils/logger.js'
import { toError } from '../utils/helpers.js'
import { TaskRelayError } from './errors.js'

const logger = createLogger('services')

export interface BaseService {
  /** Open resources and reload persisted state */
  initialize(): Promise<void>
  shutdown(): Promise<void>
}

// ---------------------------------------------------------------------------
// ServiceRegistry
// ---------------------------------------------------------------------------

/**
 * Starts services in registration order and stops the started ones in
 * reverse. A failed start stops everything started before it.
 */
export class ServiceRegistry {
  private readonly _services: { name: string; service: BaseService }[] = []
  private readonly _started: { name: string; service: BaseService }[] = []

  /**
   * @throws {TaskRelayError} SERVICE_ALREADY_REGISTERED for a duplicate name
   */
  register(name: string, service: BaseService): void {
    if (this._services.some((entry) => entry.name === name)) {
      throw new TaskRelayError(`Service "${name}" is already registered`, 'SERVICE_ALREADY_REGISTERED', {
        service: name,
      })
    }
    this._services.push({ name, service })
  }

  /**
   * @throws {TaskRelayError} SERVICE_INIT_FAILED naming the service that failed,
   * after the services started before it have been stopped again
   */
  async initializeAll(): Promise<void> {
    for (const entry of this._services) {
      if (this._started.includes(entry)) continue
      try {
        await entry.service.initialize()
      } catch (err) {
        const error = toError(err)
        logger.error({ service: entry.name, err: error }, 'Service failed to initialize')
        try {
          await this.shutdownAll()
        } catch (shutdownErr) {
          logger.error({ err: shutdownErr }, 'Error stopping services after a failed start')
        }
        throw new TaskRelayError(
          `Service "${entry.name}" failed to initialize: ${error.message}`,
          'SERVICE_INIT_FAILED',
          { service: entry.name },
        )
      }
      this._started.push(entry)
      logger.debug({ service: entry.name }, 'Service initialized')
    }
  }

  /**
   * Stop every started service, newest first. Each one is stopped even when
   * an earlier one fails; the failures are thrown together afterwards.
   */
  async shutdownAll(): Promise<void> {
    const errors: Error[] = []
    while (this._started.length > 0) {
      const entry = this._started.pop()
      if (entry === undefined) break
      try {
        await entry.service.shutdown()
        logger.debug({ service: entry.name }, 'Service stopped')
      } catch (err) {
        errors.push(toError(err))
      }
    }

    if (errors.length > 0) {
      throw new AggregateError(errors, `Shutdown errors in ${String(errors.length)} service(s)`)
    }
  }

  /** Names in registration order */
  get serviceNames(): string[] {
    return this._services.map((entry) => entry.name)
  }
}
