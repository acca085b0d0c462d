/**
 * History Types
 *
 * A change event describes one committed mutation of the calculation history.
 * Listeners receive it after the history and the undo/redo stacks agree.
 */

import type { CalculationRecord, HistoryView } from '@/types/calculation'

export type HistoryAction = 'compute' | 'undo' | 'redo' | 'clear' | 'load'

export interface HistoryChangeEvent {
  action: HistoryAction

  /** History after the mutation, oldest first */
  history: HistoryView

  /** The record added by a compute; absent for other actions */
  record?: CalculationRecord
}

export type HistoryListener = (event: HistoryChangeEvent) => void

export interface SubscriptionHandle {
  readonly id: number
}

/**
 * Undo/redo status for external consumption (e.g., prompt indicators)
 */
export interface UndoState {
  canUndo: boolean
  canRedo: boolean
  undoCount: number
  redoCount: number
}

export interface CsvOptions {
  delimiter: string
  encoding: BufferEncoding
}
