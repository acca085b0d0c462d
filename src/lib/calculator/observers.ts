/**
 * Built-in history listeners
 */

import { describeCalculation } from './calculation'
import type { Logger } from '@/lib/logger'
import type { HistoryListener } from '@/lib/history'

/**
 * Log one line per committed change
 */
export function createLoggingObserver(logger: Logger): HistoryListener {
  return (event) => {
    if (event.record) {
      logger.info(`Calculation performed: ${describeCalculation(event.record)}`)
      return
    }
    logger.info(`History ${event.action}: ${event.history.length} calculations`)
  }
}

/**
 * Save after every mutation. A load already reflects the file, so it is skipped.
 * Save failures propagate to the notifier, which logs them.
 */
export function createAutoSaveObserver(target: { save: () => void }): HistoryListener {
  return (event) => {
    if (event.action === 'load') return
    target.save()
  }
}
