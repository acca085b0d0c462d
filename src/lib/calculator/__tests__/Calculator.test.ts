import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'
import {
  Calculator,
  DivisionByZeroError,
  NothingToRedoError,
  NothingToUndoError,
  OperationError,
  PersistenceError,
  UnknownOperationError,
  createCalculatorConfig,
  type CalculatorConfigInput,
} from '../index'
import type { HistoryChangeEvent } from '@/lib/history'

/**
 * Calculator facade tests
 *
 * Each test gets its own history directory under the OS temp dir.
 */

let dir: string

function createCalculator(overrides: CalculatorConfigInput = {}): Calculator {
  return new Calculator({
    config: createCalculatorConfig({
      historyDir: dir,
      autoSave: false,
      loadOnStart: false,
      logLevel: 'silent',
      ...overrides,
    }),
  })
}

function summarize(calculator: Calculator): string[] {
  return calculator.formatHistory()
}

describe('Calculator', () => {
  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'calculator-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  describe('compute', () => {
    it('should return the record and append it to history', () => {
      const calculator = createCalculator()

      const record = calculator.compute('add', 5, 10)

      expect(record).toMatchObject({ operation: 'add', a: 5, b: 10, result: 15 })
      expect(Object.isFrozen(record)).toBe(true)
      expect(calculator.list()).toEqual([record])
    })

    it('should evict the oldest calculation past the max size', () => {
      const calculator = createCalculator({ maxHistorySize: 2 })

      calculator.compute('add', 1, 1)
      calculator.compute('add', 2, 2)
      calculator.compute('add', 3, 3)

      expect(summarize(calculator)).toEqual(['add(2, 2) = 4', 'add(3, 3) = 6'])
    })

    it('should leave history and undo stack untouched on division by zero', () => {
      const calculator = createCalculator()

      expect(() => calculator.compute('divide', 5, 0)).toThrow(DivisionByZeroError)
      expect(calculator.list()).toEqual([])
      expect(calculator.getUndoState().undoCount).toBe(0)
    })

    it('should reject an unknown operation without changing state', () => {
      const calculator = createCalculator()
      calculator.compute('add', 1, 2)

      expect(() => calculator.compute('modulus', 5, 2)).toThrow(UnknownOperationError)
      expect(summarize(calculator)).toEqual(['add(1, 2) = 3'])
      expect(calculator.getUndoState().undoCount).toBe(1)
    })

    it('should reject non-finite operands', () => {
      const calculator = createCalculator()

      expect(() => calculator.compute('add', Number.NaN, 1)).toThrow(OperationError)
      expect(() => calculator.compute('add', 1, Infinity)).toThrow(OperationError)
      expect(calculator.list()).toEqual([])
    })

    it('should not notify listeners when evaluation fails', () => {
      const calculator = createCalculator()
      const listener = vi.fn()
      calculator.subscribe(listener)

      expect(() => calculator.compute('root', -4, 2)).toThrow(OperationError)
      expect(listener).not.toHaveBeenCalled()
    })
  })

  describe('undo/redo', () => {
    it('should undo and redo the last calculation', () => {
      const calculator = createCalculator()
      calculator.compute('add', 5, 10)
      calculator.compute('multiply', 3, 4)

      calculator.undo()
      expect(summarize(calculator)).toEqual(['add(5, 10) = 15'])

      calculator.redo()
      expect(summarize(calculator)).toEqual(['add(5, 10) = 15', 'multiply(3, 4) = 12'])
    })

    it('should return the restored history', () => {
      const calculator = createCalculator()
      const first = calculator.compute('add', 5, 10)
      calculator.compute('multiply', 3, 4)

      expect(calculator.undo()).toEqual([first])
    })

    it('should return to the starting state after undoing every mutation', () => {
      const calculator = createCalculator()
      calculator.compute('add', 1, 1)
      const start = calculator.list()

      calculator.compute('subtract', 5, 3)
      calculator.compute('power', 2, 3)
      calculator.compute('root', 27, 3)
      calculator.undo()
      calculator.undo()
      calculator.undo()

      expect(calculator.list()).toEqual(start)
    })

    it('should restore an evicted record on undo', () => {
      const calculator = createCalculator({ maxHistorySize: 2 })
      calculator.compute('add', 1, 1)
      calculator.compute('add', 2, 2)
      calculator.compute('add', 3, 3)

      calculator.undo()

      expect(summarize(calculator)).toEqual(['add(1, 1) = 2', 'add(2, 2) = 4'])
    })

    it('should throw NothingToUndoError with no history', () => {
      const calculator = createCalculator()

      expect(() => calculator.undo()).toThrow(NothingToUndoError)
    })

    it('should throw NothingToRedoError when nothing was undone', () => {
      const calculator = createCalculator()
      calculator.compute('add', 1, 1)

      expect(() => calculator.redo()).toThrow(NothingToRedoError)
    })

    it('should drop redo history after a new calculation', () => {
      const calculator = createCalculator()
      calculator.compute('add', 5, 10)
      calculator.compute('multiply', 3, 4)
      calculator.undo()

      calculator.compute('divide', 8, 2)

      expect(() => calculator.redo()).toThrow(NothingToRedoError)
      expect(summarize(calculator)).toEqual(['add(5, 10) = 15', 'divide(8, 2) = 4'])
    })

    it('should report undo/redo availability', () => {
      const calculator = createCalculator()
      calculator.compute('add', 5, 10)
      calculator.compute('multiply', 3, 4)
      calculator.undo()

      expect(calculator.getUndoState()).toEqual({
        canUndo: true,
        canRedo: true,
        undoCount: 1,
        redoCount: 1,
      })
    })
  })

  describe('clear', () => {
    it('should empty history and forget undo/redo', () => {
      const calculator = createCalculator()
      calculator.compute('add', 5, 10)
      calculator.compute('multiply', 3, 4)
      calculator.undo()

      calculator.clear()

      expect(calculator.list()).toEqual([])
      expect(() => calculator.undo()).toThrow(NothingToUndoError)
      expect(() => calculator.redo()).toThrow(NothingToRedoError)
    })
  })

  describe('save/load', () => {
    it('should save to the configured history file, creating its directory', () => {
      const historyFile = path.join(dir, 'nested', 'calc.csv')
      const calculator = createCalculator({ historyFile })
      calculator.compute('add', 5, 10)

      calculator.save()

      const lines = readFileSync(historyFile, 'utf-8').trimEnd().split('\n')
      expect(lines[0]).toBe('operation,operand_a,operand_b,result,timestamp')
      expect(lines[1]).toMatch(/^add,5,10,15,\d{4}-\d{2}-\d{2}T[\d:.]+Z$/)
    })

    it('should round-trip history through save and load', () => {
      const file = path.join(dir, 'saved.csv')
      const calculator = createCalculator()
      calculator.compute('add', 5, 10)
      calculator.compute('divide', 1, 3)
      calculator.save(file)

      const other = createCalculator()
      other.load(file)

      expect(other.list()).toEqual(calculator.list())
    })

    it('should raise PersistenceError and keep history when loading a missing file', () => {
      const calculator = createCalculator()
      calculator.compute('add', 5, 10)
      const before = calculator.list()

      expect(() => calculator.load(path.join(dir, 'missing.csv'))).toThrow(PersistenceError)
      expect(calculator.list()).toBe(before)
      expect(calculator.getUndoState().undoCount).toBe(1)
    })

    it('should not make a load undoable', () => {
      const file = path.join(dir, 'saved.csv')
      const source = createCalculator()
      source.compute('add', 5, 10)
      source.save(file)

      const calculator = createCalculator()
      calculator.compute('multiply', 3, 4)
      calculator.load(file)

      expect(summarize(calculator)).toEqual(['add(5, 10) = 15'])
      expect(() => calculator.undo()).toThrow(NothingToUndoError)
    })

    it('should raise PersistenceError when saving into a missing directory', () => {
      const calculator = createCalculator()

      expect(() => calculator.save(path.join(dir, 'missing', 'saved.csv'))).toThrow(PersistenceError)
    })
  })

  describe('listeners', () => {
    it('should notify after each mutation with the post-mutation history', () => {
      const calculator = createCalculator()
      const events: HistoryChangeEvent[] = []
      calculator.subscribe((event) => events.push(event))

      const record = calculator.compute('add', 5, 10)
      calculator.undo()
      calculator.redo()
      calculator.clear()

      expect(events.map((event) => event.action)).toEqual(['compute', 'undo', 'redo', 'clear'])
      expect(events[0]).toEqual({ action: 'compute', history: [record], record })
      expect(events[1].history).toEqual([])
      expect(events[2].history).toEqual([record])
      expect(events[3].history).toEqual([])
    })

    it('should see a consistent undo state from inside a listener', () => {
      const calculator = createCalculator()
      const seen: boolean[] = []
      calculator.subscribe(() => seen.push(calculator.getUndoState().canUndo))

      calculator.compute('add', 1, 1)
      calculator.undo()

      expect(seen).toEqual([true, false])
    })

    it('should notify on load', () => {
      const file = path.join(dir, 'saved.csv')
      const source = createCalculator()
      source.compute('add', 5, 10)
      source.save(file)

      const calculator = createCalculator()
      const listener = vi.fn()
      calculator.subscribe(listener)
      calculator.load(file)

      expect(listener).toHaveBeenCalledTimes(1)
      expect(listener.mock.calls[0][0]).toMatchObject({ action: 'load' })
    })

    it('should keep the mutation when a listener throws', () => {
      const calculator = createCalculator()
      calculator.subscribe(() => {
        throw new Error('listener broke')
      })

      const record = calculator.compute('add', 5, 10)

      expect(calculator.list()).toEqual([record])
    })

    it('should stop notifying after unsubscribe', () => {
      const calculator = createCalculator()
      const listener = vi.fn()
      const handle = calculator.subscribe(listener)

      calculator.unsubscribe(handle)
      calculator.compute('add', 5, 10)

      expect(listener).not.toHaveBeenCalled()
    })

    it('should expose the underlying store', () => {
      const calculator = createCalculator()
      const record = calculator.compute('add', 5, 10)

      expect(calculator.getStore().getState().records).toEqual([record])
    })
  })

  describe('auto-save', () => {
    it('should save after every mutation', () => {
      const calculator = createCalculator({ autoSave: true })
      const file = calculator.config.historyFile

      calculator.compute('add', 5, 10)
      expect(readFileSync(file, 'utf-8')).toContain('add,5,10,15,')

      calculator.undo()
      expect(readFileSync(file, 'utf-8')).toBe('operation,operand_a,operand_b,result,timestamp\n')
    })

    it('should not save when disabled', () => {
      const calculator = createCalculator({ autoSave: false })

      calculator.compute('add', 5, 10)

      expect(existsSync(calculator.config.historyFile)).toBe(false)
    })

    it('should log a failed save and keep the calculation', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
      const blocker = path.join(dir, 'blocker')
      writeFileSync(blocker, '')
      const calculator = createCalculator({
        autoSave: true,
        logLevel: 'error',
        historyFile: path.join(blocker, 'history.csv'),
      })

      const record = calculator.compute('add', 5, 10)

      expect(calculator.list()).toEqual([record])
      expect(errorSpy).toHaveBeenCalledTimes(1)
      expect(errorSpy.mock.calls[0][0]).toContain('[Calculator:notifier] Listener #2 failed on compute')
    })
  })

  describe('start-up', () => {
    it('should load an existing history file', () => {
      const first = createCalculator()
      first.compute('add', 5, 10)
      first.save()

      const second = createCalculator({ loadOnStart: true })

      expect(summarize(second)).toEqual(['add(5, 10) = 15'])
    })

    it('should start empty when there is no history file', () => {
      const calculator = createCalculator({ loadOnStart: true })

      expect(calculator.list()).toEqual([])
    })

    it('should warn and start empty when the history file is malformed', () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {})
      writeFileSync(path.join(dir, 'calculator_history.csv'), 'not,a,history\n')

      const calculator = createCalculator({ loadOnStart: true, logLevel: 'warn' })

      expect(calculator.list()).toEqual([])
      expect(warnSpy).toHaveBeenCalledTimes(1)
      expect(warnSpy.mock.calls[0][0]).toContain('[Calculator] Could not load existing history')
    })
  })
})
