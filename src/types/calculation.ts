/**
 * Calculation Types
 *
 * Shared shapes for calculation records and the history views built from them.
 */

export const OPERATION_KINDS = [
  'add',
  'subtract',
  'multiply',
  'divide',
  'power',
  'root',
] as const

export type OperationKind = (typeof OPERATION_KINDS)[number]

/**
 * One evaluated operation. Frozen on creation; compare with isSameCalculation.
 */
export interface CalculationRecord {
  readonly operation: OperationKind
  readonly a: number
  readonly b: number
  readonly result: number
  /** Creation instant, epoch milliseconds */
  readonly timestamp: number
}

/**
 * Ordered history, oldest first. Views handed out by the store are frozen.
 */
export type HistoryView = readonly CalculationRecord[]
