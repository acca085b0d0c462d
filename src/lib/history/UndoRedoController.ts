/**
 * UndoRedoController - Snapshot-based undo/redo
 *
 * Keeps two LIFO stacks of whole-history snapshots. The caller hands in the
 * current history on every call; the controller never holds the live store.
 *
 * - snapshotBeforeMutation() records the pre-mutation history and drops redo
 * - undo()/redo() trade the current history for the top of the other stack
 * - reset() forgets everything
 *
 * Snapshots are frozen arrays of frozen records, so pushing one costs a single
 * shallow copy and nothing can alter it afterwards.
 */

import { freeze } from 'immer'
import type { HistoryView } from '@/types/calculation'
import { NothingToRedoError, NothingToUndoError } from '@/lib/errors'
import type { UndoState } from './types'

function snapshot(history: HistoryView): HistoryView {
  return freeze([...history])
}

export class UndoRedoController {
  private undoStack: HistoryView[] = []
  private redoStack: HistoryView[] = []

  /**
   * Record the history as it is before a mutation commits.
   * A new action invalidates everything that could have been redone.
   */
  snapshotBeforeMutation(currentState: HistoryView): void {
    this.undoStack.push(snapshot(currentState))
    this.redoStack = []
  }

  /**
   * Step back one mutation
   *
   * @returns the history to restore
   * @throws NothingToUndoError if there is no earlier snapshot
   */
  undo(currentState: HistoryView): HistoryView {
    const previous = this.undoStack.pop()
    if (!previous) throw new NothingToUndoError()

    this.redoStack.push(snapshot(currentState))
    return previous
  }

  /**
   * Re-apply the last undone mutation
   *
   * @returns the history to restore
   * @throws NothingToRedoError if nothing has been undone since the last action
   */
  redo(currentState: HistoryView): HistoryView {
    const next = this.redoStack.pop()
    if (!next) throw new NothingToRedoError()

    this.undoStack.push(snapshot(currentState))
    return next
  }

  reset(): void {
    this.undoStack = []
    this.redoStack = []
  }

  getState(): UndoState {
    return {
      canUndo: this.undoStack.length > 0,
      canRedo: this.redoStack.length > 0,
      undoCount: this.undoStack.length,
      redoCount: this.redoStack.length,
    }
  }
}
