/**
 * ChangeNotifier - Ordered, isolated history listeners
 *
 * Listeners run synchronously in registration order. A listener that throws
 * is logged and skipped; the others still run and the mutation stands.
 */

import { describeError } from '@/lib/errors'
import { createLogger, type Logger } from '@/lib/logger'
import type { HistoryChangeEvent, HistoryListener, SubscriptionHandle } from './types'

export class ChangeNotifier {
  private listeners = new Map<number, HistoryListener>()
  private nextId = 1
  private readonly logger: Logger

  constructor(logger: Logger = createLogger('ChangeNotifier')) {
    this.logger = logger
  }

  get size(): number {
    return this.listeners.size
  }

  subscribe(listener: HistoryListener): SubscriptionHandle {
    const handle: SubscriptionHandle = Object.freeze({ id: this.nextId++ })
    this.listeners.set(handle.id, listener)
    return handle
  }

  /**
   * Remove a listener. Unknown or already-removed handles are ignored.
   */
  unsubscribe(handle: SubscriptionHandle): void {
    this.listeners.delete(handle.id)
  }

  notify(event: HistoryChangeEvent): void {
    // Copy so listeners may (un)subscribe while being notified
    const entries = [...this.listeners]
    for (const [id, listener] of entries) {
      try {
        listener(event)
      } catch (error) {
        this.logger.error(
          `Listener #${id} failed on ${event.action}: ${describeError(error)}`,
          error
        )
      }
    }
  }
}
