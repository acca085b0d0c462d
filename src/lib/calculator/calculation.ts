/**
 * CalculationRecord helpers
 */

import { freeze } from 'immer'
import type { CalculationRecord, OperationKind } from '@/types/calculation'

export function createCalculation(fields: {
  operation: OperationKind
  a: number
  b: number
  result: number
  timestamp?: number
}): CalculationRecord {
  return freeze({
    operation: fields.operation,
    a: fields.a,
    b: fields.b,
    result: fields.result,
    timestamp: fields.timestamp ?? Date.now(),
  })
}

export function isSameCalculation(left: CalculationRecord, right: CalculationRecord): boolean {
  return (
    left.operation === right.operation &&
    left.a === right.a &&
    left.b === right.b &&
    left.result === right.result &&
    left.timestamp === right.timestamp
  )
}

/** `add(5, 10) = 15` */
export function describeCalculation(record: CalculationRecord): string {
  return `${record.operation}(${record.a}, ${record.b}) = ${record.result}`
}
