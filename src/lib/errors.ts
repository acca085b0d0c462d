/**
 * Calculator Errors
 *
 * Every failure the core reports to its caller is a CalculatorError with a
 * stable `code`, so a command interpreter can branch on it without matching
 * messages.
 */

export type CalculatorErrorCode =
  | 'UNKNOWN_OPERATION'
  | 'OPERATION_FAILED'
  | 'DIVISION_BY_ZERO'
  | 'INVALID_ROOT'
  | 'NOTHING_TO_UNDO'
  | 'NOTHING_TO_REDO'
  | 'PERSISTENCE_FAILED'
  | 'INVALID_CONFIG'

const CALCULATOR_ERROR_BRAND = Symbol.for('calc-history.error')

export class CalculatorError extends Error {
  readonly code: CalculatorErrorCode
  readonly [CALCULATOR_ERROR_BRAND] = true

  constructor(code: CalculatorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CalculatorError'
    this.code = code
  }
}

export function isCalculatorError(value: unknown): value is CalculatorError {
  return typeof value === 'object' && value !== null && CALCULATOR_ERROR_BRAND in value
}

export class UnknownOperationError extends CalculatorError {
  readonly operation: string

  constructor(operation: string) {
    super('UNKNOWN_OPERATION', `Unknown operation: ${operation}`)
    this.name = 'UnknownOperationError'
    this.operation = operation
  }
}

export class OperationError extends CalculatorError {
  constructor(message: string, code: CalculatorErrorCode = 'OPERATION_FAILED') {
    super(code, message)
    this.name = 'OperationError'
  }
}

export class DivisionByZeroError extends OperationError {
  constructor() {
    super('Division by zero is not allowed', 'DIVISION_BY_ZERO')
    this.name = 'DivisionByZeroError'
  }
}

export class InvalidRootError extends OperationError {
  constructor(message: string) {
    super(message, 'INVALID_ROOT')
    this.name = 'InvalidRootError'
  }
}

export class NothingToUndoError extends CalculatorError {
  constructor() {
    super('NOTHING_TO_UNDO', 'Nothing to undo')
    this.name = 'NothingToUndoError'
  }
}

export class NothingToRedoError extends CalculatorError {
  constructor() {
    super('NOTHING_TO_REDO', 'Nothing to redo')
    this.name = 'NothingToRedoError'
  }
}

export class PersistenceError extends CalculatorError {
  readonly path: string

  constructor(message: string, path: string, cause?: unknown) {
    super('PERSISTENCE_FAILED', message, { cause })
    this.name = 'PersistenceError'
    this.path = path
  }
}

export class ConfigurationError extends CalculatorError {
  constructor(message: string) {
    super('INVALID_CONFIG', message)
    this.name = 'ConfigurationError'
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
