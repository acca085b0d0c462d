/**
 * HistoryStore - Bounded, persisted calculation history
 *
 * Records live in a zustand vanilla store as a frozen array; every mutation
 * produces a new array through immer, so a view handed out by list() is never
 * changed underneath its holder and can double as an undo snapshot.
 *
 * Length never exceeds maxSize: append evicts the oldest record first.
 */

import { readFileSync, writeFileSync } from 'node:fs'
import { freeze, produce } from 'immer'
import { createStore, type StoreApi } from 'zustand/vanilla'
import type { CalculationRecord, HistoryView } from '@/types/calculation'
import { ConfigurationError, PersistenceError, describeError } from '@/lib/errors'
import { createLogger, type Logger } from '@/lib/logger'
import { parseHistory, serializeHistory } from './historyCsv'
import type { CsvOptions } from './types'

export const DEFAULT_MAX_HISTORY_SIZE = 100

const EMPTY_HISTORY: HistoryView = freeze([])

export interface HistoryStoreState {
  records: HistoryView
}

export interface HistoryStoreOptions extends Partial<CsvOptions> {
  maxSize?: number
  logger?: Logger
}

export class HistoryStore {
  readonly maxSize: number
  readonly store: StoreApi<HistoryStoreState>

  private readonly csv: CsvOptions
  private readonly logger: Logger

  constructor(options: HistoryStoreOptions = {}) {
    const maxSize = options.maxSize ?? DEFAULT_MAX_HISTORY_SIZE
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new ConfigurationError(`maxSize must be a positive integer, got ${maxSize}`)
    }

    this.maxSize = maxSize
    this.csv = {
      delimiter: options.delimiter ?? ',',
      encoding: options.encoding ?? 'utf-8',
    }
    this.logger = options.logger ?? createLogger('HistoryStore')
    this.store = createStore<HistoryStoreState>()(() => ({ records: EMPTY_HISTORY }))
  }

  get size(): number {
    return this.list().length
  }

  /**
   * Add a record as the newest entry, evicting the oldest if over capacity
   */
  append(record: CalculationRecord): void {
    const maxSize = this.maxSize
    this.setRecords(produce(this.list(), (draft) => {
      draft.push(record)
      if (draft.length > maxSize) {
        draft.splice(0, draft.length - maxSize)
      }
    }))
  }

  /**
   * Current records, oldest first
   */
  list(): HistoryView {
    return this.store.getState().records
  }

  clear(): void {
    this.setRecords(EMPTY_HISTORY)
  }

  /**
   * Swap in a whole snapshot. Eviction is not re-applied.
   */
  replace(snapshot: HistoryView): void {
    this.setRecords(Object.isFrozen(snapshot) ? snapshot : freeze([...snapshot]))
  }

  /**
   * Write the current records to a CSV file
   *
   * @throws PersistenceError if the file cannot be written
   */
  save(destination: string): void {
    const records = this.list()
    try {
      writeFileSync(destination, serializeHistory(records, this.csv.delimiter), {
        encoding: this.csv.encoding,
      })
    } catch (error) {
      throw new PersistenceError(
        `Failed to save history to ${destination}: ${describeError(error)}`,
        destination,
        error
      )
    }
    this.logger.info(`Saved ${records.length} calculations to ${destination}`)
  }

  /**
   * Replace the current records with those read from a CSV file.
   * Nothing changes unless the whole file parses.
   *
   * @throws PersistenceError if the file is missing, unreadable or malformed
   */
  load(source: string): void {
    let records: CalculationRecord[]
    try {
      const text = readFileSync(source, { encoding: this.csv.encoding })
      records = parseHistory(text, this.csv.delimiter)
    } catch (error) {
      throw new PersistenceError(
        `Failed to load history from ${source}: ${describeError(error)}`,
        source,
        error
      )
    }

    if (records.length > this.maxSize) {
      this.logger.warn(
        `${source} holds ${records.length} calculations; keeping the newest ${this.maxSize}`
      )
      records = records.slice(records.length - this.maxSize)
    }

    this.setRecords(freeze(records))
    this.logger.info(`Loaded ${records.length} calculations from ${source}`)
  }

  private setRecords(records: HistoryView): void {
    this.store.setState({ records }, true)
  }
}
