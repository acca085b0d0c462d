/**
 * Calculator - Entry point for the command interpreter
 *
 * Owns the history store, the undo/redo controller and the change notifier,
 * and sequences them so listeners only ever see a consistent state:
 *
 *   compute:  evaluate -> snapshot -> append -> notify
 *   undo:     controller.undo(current) -> replace -> notify
 *   clear:    empty -> reset stacks -> notify
 *   load:     read file -> reset stacks -> notify
 *
 * Failed operations leave history and both stacks untouched.
 */

import { existsSync, mkdirSync } from 'node:fs'
import path from 'node:path'
import type { CalculationRecord, HistoryView } from '@/types/calculation'
import { loadCalculatorConfig, type CalculatorConfig } from '@/lib/config'
import { OperationError, PersistenceError, describeError } from '@/lib/errors'
import { createLogger, type Logger } from '@/lib/logger'
import {
  ChangeNotifier,
  HistoryStore,
  UndoRedoController,
  type HistoryChangeEvent,
  type HistoryListener,
  type HistoryStoreState,
  type SubscriptionHandle,
  type UndoState,
} from '@/lib/history'
import type { StoreApi } from 'zustand/vanilla'
import { createCalculation, describeCalculation } from './calculation'
import { operations, resolveOperation } from './operations'
import { createAutoSaveObserver, createLoggingObserver } from './observers'

export interface CalculatorOptions {
  /** Defaults to loadCalculatorConfig() (environment variables) */
  config?: CalculatorConfig
  logger?: Logger
}

export class Calculator {
  readonly config: CalculatorConfig

  private readonly logger: Logger
  private readonly history: HistoryStore
  private readonly undoRedo = new UndoRedoController()
  private readonly notifier: ChangeNotifier

  constructor(options: CalculatorOptions = {}) {
    this.config = options.config ?? loadCalculatorConfig()
    this.logger = options.logger ?? createLogger('Calculator', this.config.logLevel)

    this.history = new HistoryStore({
      maxSize: this.config.maxHistorySize,
      delimiter: this.config.csvDelimiter,
      encoding: this.config.defaultEncoding,
      logger: this.logger.child('history'),
    })
    this.notifier = new ChangeNotifier(this.logger.child('notifier'))

    this.notifier.subscribe(createLoggingObserver(this.logger))
    if (this.config.autoSave) {
      this.notifier.subscribe(createAutoSaveObserver(this))
    }

    if (this.config.loadOnStart) {
      this.loadExisting()
    }
  }

  /**
   * Evaluate an operation and record it
   *
   * @throws UnknownOperationError if the operation is not supported
   * @throws OperationError (or DivisionByZeroError / InvalidRootError) if evaluation fails
   */
  compute(operation: string, a: number, b: number): CalculationRecord {
    const kind = resolveOperation(operation)
    if (!Number.isFinite(a) || !Number.isFinite(b)) {
      throw new OperationError(`Operands must be finite numbers, got ${a} and ${b}`)
    }

    const result = operations[kind](a, b)
    const record = createCalculation({ operation: kind, a, b, result })

    this.undoRedo.snapshotBeforeMutation(this.history.list())
    this.history.append(record)
    this.logger.debug(`compute ${describeCalculation(record)}`)

    this.notify('compute', record)
    return record
  }

  /**
   * @throws NothingToUndoError
   */
  undo(): HistoryView {
    this.history.replace(this.undoRedo.undo(this.history.list()))
    this.logger.debug(`undo -> ${this.history.size} calculations`)
    this.notify('undo')
    return this.history.list()
  }

  /**
   * @throws NothingToRedoError
   */
  redo(): HistoryView {
    this.history.replace(this.undoRedo.redo(this.history.list()))
    this.logger.debug(`redo -> ${this.history.size} calculations`)
    this.notify('redo')
    return this.history.list()
  }

  /**
   * Empty the history. Clearing also forgets undo/redo, so it cannot be undone.
   */
  clear(): void {
    this.history.clear()
    this.undoRedo.reset()
    this.logger.info('History cleared')
    this.notify('clear')
  }

  /**
   * Write history to `filePath`, or to the configured history file
   * (creating its directory if needed).
   *
   * @throws PersistenceError
   */
  save(filePath?: string): void {
    if (filePath === undefined) {
      this.ensureHistoryDir()
    }
    this.history.save(filePath ?? this.config.historyFile)
  }

  /**
   * Replace history with the contents of `filePath` (or the configured file).
   *
   * Not undoable, and more than a plain delegation to the store: both stacks
   * are reset as well, so an undo after a load cannot restore records from
   * before it.
   *
   * @throws PersistenceError; history is unchanged on failure
   */
  load(filePath?: string): void {
    this.history.load(filePath ?? this.config.historyFile)
    this.undoRedo.reset()
    this.notify('load')
  }

  list(): HistoryView {
    return this.history.list()
  }

  /** `add(5, 10) = 15`, oldest first */
  formatHistory(): string[] {
    return this.history.list().map(describeCalculation)
  }

  getUndoState(): UndoState {
    return this.undoRedo.getState()
  }

  /**
   * Raw store for bindings that want zustand's own subscribe/getState
   */
  getStore(): StoreApi<HistoryStoreState> {
    return this.history.store
  }

  subscribe(listener: HistoryListener): SubscriptionHandle {
    return this.notifier.subscribe(listener)
  }

  unsubscribe(handle: SubscriptionHandle): void {
    this.notifier.unsubscribe(handle)
  }

  private notify(action: HistoryChangeEvent['action'], record?: CalculationRecord): void {
    this.notifier.notify({ action, history: this.history.list(), record })
  }

  private ensureHistoryDir(): void {
    const dir = path.dirname(this.config.historyFile)
    try {
      mkdirSync(dir, { recursive: true })
    } catch (error) {
      throw new PersistenceError(
        `Failed to create history directory ${dir}: ${describeError(error)}`,
        dir,
        error
      )
    }
  }

  private loadExisting(): void {
    const file = this.config.historyFile
    if (!existsSync(file)) {
      this.logger.info(`No history file at ${file}; starting with empty history`)
      return
    }
    try {
      this.history.load(file)
    } catch (error) {
      this.logger.warn(`Could not load existing history: ${describeError(error)}`)
    }
  }
}
