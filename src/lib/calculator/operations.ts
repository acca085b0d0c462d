/**
 * Operation dispatch table
 *
 * Each operation is a pure (a, b) => number function. Lookup goes through a
 * static table keyed by OperationKind; there is no runtime registration.
 */

import { OPERATION_KINDS, type OperationKind } from '@/types/calculation'
import {
  DivisionByZeroError,
  InvalidRootError,
  OperationError,
  UnknownOperationError,
} from '@/lib/errors'

export type BinaryOperation = (a: number, b: number) => number

function ensureFinite(operation: OperationKind, result: number): number {
  if (!Number.isFinite(result)) {
    throw new OperationError(`${operation} produced a non-finite result`)
  }
  return result
}

function root(a: number, degree: number): number {
  if (degree === 0) {
    throw new InvalidRootError('Zero root is undefined')
  }
  if (a < 0) {
    const oddInteger = Number.isInteger(degree) && Math.abs(degree) % 2 === 1
    if (!oddInteger) {
      throw new InvalidRootError(`Cannot take root ${degree} of negative number ${a}`)
    }
    return -(Math.abs(a) ** (1 / degree))
  }
  return a ** (1 / degree)
}

export const operations: Readonly<Record<OperationKind, BinaryOperation>> = Object.freeze({
  add: (a, b) => ensureFinite('add', a + b),
  subtract: (a, b) => ensureFinite('subtract', a - b),
  multiply: (a, b) => ensureFinite('multiply', a * b),
  divide: (a, b) => {
    if (b === 0) throw new DivisionByZeroError()
    return ensureFinite('divide', a / b)
  },
  power: (a, b) => ensureFinite('power', a ** b),
  root: (a, b) => ensureFinite('root', root(a, b)),
})

export function isOperationKind(value: string): value is OperationKind {
  return OPERATION_KINDS.some((kind) => kind === value)
}

export function resolveOperation(name: string): OperationKind {
  if (!isOperationKind(name)) {
    throw new UnknownOperationError(name)
  }
  return name
}

