/**
 * Calculator Module
 *
 * Usage:
 *   import { Calculator, createCalculatorConfig } from '@/lib/calculator'
 *
 *   const calculator = new Calculator({
 *     config: createCalculatorConfig({ maxHistorySize: 50, autoSave: false }),
 *   })
 *
 *   calculator.compute('add', 5, 10)      // add(5, 10) = 15
 *   calculator.undo()
 *   calculator.redo()
 *   calculator.save()
 */

export { Calculator } from './Calculator'
export type { CalculatorOptions } from './Calculator'
export { operations, isOperationKind, resolveOperation } from './operations'
export type { BinaryOperation } from './operations'
export { createCalculation, isSameCalculation, describeCalculation } from './calculation'
export { createAutoSaveObserver, createLoggingObserver } from './observers'
export { createCalculatorConfig, loadCalculatorConfig } from '@/lib/config'
export type { CalculatorConfig, CalculatorConfigInput } from '@/lib/config'
export * from '@/lib/errors'
export { OPERATION_KINDS } from '@/types/calculation'
export type { CalculationRecord, HistoryView, OperationKind } from '@/types/calculation'
