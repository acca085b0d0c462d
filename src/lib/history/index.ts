/**
 * History Module - Bounded history, snapshot undo/redo, change listeners
 *
 * Usage:
 *   import { HistoryStore, UndoRedoController, ChangeNotifier } from '@/lib/history'
 *
 *   const store = new HistoryStore({ maxSize: 50 })
 *   const undoRedo = new UndoRedoController()
 *
 *   undoRedo.snapshotBeforeMutation(store.list())
 *   store.append(record)
 *
 *   store.replace(undoRedo.undo(store.list()))
 */

export { HistoryStore, DEFAULT_MAX_HISTORY_SIZE } from './HistoryStore'
export type { HistoryStoreOptions, HistoryStoreState } from './HistoryStore'
export { UndoRedoController } from './UndoRedoController'
export { ChangeNotifier } from './ChangeNotifier'
export { serializeHistory, parseHistory, parseCsvRows, CsvFormatError, HISTORY_COLUMNS } from './historyCsv'
export type {
  CsvOptions,
  HistoryAction,
  HistoryChangeEvent,
  HistoryListener,
  SubscriptionHandle,
  UndoState,
} from './types'
