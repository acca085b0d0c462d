/**
 * History CSV codec
 *
 * One row per record under a required header:
 *   operation,operand_a,operand_b,result,timestamp
 *
 * Columns are located by header name. Fields holding the delimiter, a quote
 * or a line break are quoted, with inner quotes doubled.
 */

import type { CalculationRecord, HistoryView } from '@/types/calculation'
import { createCalculation } from '@/lib/calculator/calculation'
import { isOperationKind } from '@/lib/calculator/operations'

export const HISTORY_COLUMNS = ['operation', 'operand_a', 'operand_b', 'result', 'timestamp'] as const

type HistoryColumn = (typeof HISTORY_COLUMNS)[number]

export class CsvFormatError extends Error {
  readonly row: number

  constructor(row: number, message: string) {
    super(`Row ${row}: ${message}`)
    this.name = 'CsvFormatError'
    this.row = row
  }
}

// ============================================
// Writing
// ============================================

function formatField(value: string, delimiter: string): string {
  const needsQuotes =
    value.includes(delimiter) ||
    value.includes('"') ||
    value.includes('\n') ||
    value.includes('\r')
  return needsQuotes ? `"${value.replace(/"/g, '""')}"` : value
}

// String(-0) is "0"
function formatNumber(value: number): string {
  return Object.is(value, -0) ? '-0' : String(value)
}

function formatRow(fields: readonly string[], delimiter: string): string {
  return fields.map((field) => formatField(field, delimiter)).join(delimiter)
}

export function serializeHistory(records: HistoryView, delimiter = ','): string {
  const lines = [formatRow(HISTORY_COLUMNS, delimiter)]
  for (const record of records) {
    lines.push(formatRow([
      record.operation,
      formatNumber(record.a),
      formatNumber(record.b),
      formatNumber(record.result),
      new Date(record.timestamp).toISOString(),
    ], delimiter))
  }
  return lines.join('\n') + '\n'
}

// ============================================
// Reading
// ============================================

/**
 * Split CSV text into rows of raw fields. Blank lines are dropped.
 */
export function parseCsvRows(text: string, delimiter = ','): string[][] {
  const rows: string[][] = []
  let row: string[] = []
  let field = ''
  let inQuotes = false
  let fieldQuoted = false

  const endField = () => {
    row.push(field)
    field = ''
    fieldQuoted = false
  }
  const endRow = () => {
    endField()
    const blank = row.length === 1 && row[0] === ''
    if (!blank) rows.push(row)
    row = []
  }

  const source = text.startsWith('\uFEFF') ? text.slice(1) : text

  for (let i = 0; i < source.length; i++) {
    const char = source[i]

    if (inQuotes) {
      if (char === '"') {
        if (source[i + 1] === '"') {
          field += '"'
          i++
        } else {
          inQuotes = false
        }
      } else {
        field += char
      }
      continue
    }

    if (char === '"' && field === '' && !fieldQuoted) {
      inQuotes = true
      fieldQuoted = true
    } else if (char === delimiter) {
      endField()
    } else if (char === '\n') {
      endRow()
    } else if (char === '\r') {
      if (source[i + 1] === '\n') i++
      endRow()
    } else {
      field += char
    }
  }

  if (inQuotes) {
    throw new CsvFormatError(rows.length + 1, 'unterminated quoted field')
  }
  if (field !== '' || row.length > 0 || fieldQuoted) {
    endRow()
  }

  return rows
}

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/
const ISO_8601_PATTERN =
  /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/

function parseNumber(raw: string, column: HistoryColumn, rowNumber: number): number {
  const trimmed = raw.trim()
  const value = DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : Number.NaN
  if (!Number.isFinite(value)) {
    throw new CsvFormatError(rowNumber, `${column} is not a number: "${raw}"`)
  }
  return value
}

function parseTimestamp(raw: string, rowNumber: number): number {
  const trimmed = raw.trim()
  const value = ISO_8601_PATTERN.test(trimmed) ? Date.parse(trimmed) : Number.NaN
  if (Number.isNaN(value)) {
    throw new CsvFormatError(rowNumber, `timestamp is not an ISO-8601 date: "${raw}"`)
  }
  return value
}

/**
 * Parse history CSV into frozen records, oldest first.
 *
 * @throws CsvFormatError on a missing header or column, an unknown operation,
 *   a non-numeric operand or result, or an unparsable timestamp
 */
export function parseHistory(text: string, delimiter = ','): CalculationRecord[] {
  const [header, ...body] = parseCsvRows(text, delimiter)
  if (!header) {
    throw new CsvFormatError(1, 'missing header row')
  }

  const names = header.map((name) => name.trim())
  const columnIndex = new Map<HistoryColumn, number>()
  for (const column of HISTORY_COLUMNS) {
    const index = names.indexOf(column)
    if (index === -1) {
      throw new CsvFormatError(1, `missing column "${column}"`)
    }
    columnIndex.set(column, index)
  }

  return body.map((fields, offset) => {
    const rowNumber = offset + 2
    const cell = (column: HistoryColumn): string => {
      const index = columnIndex.get(column)
      const value = index === undefined ? undefined : fields[index]
      if (value === undefined) {
        throw new CsvFormatError(rowNumber, `missing value for "${column}"`)
      }
      return value
    }

    const operation = cell('operation').trim()
    if (!isOperationKind(operation)) {
      throw new CsvFormatError(rowNumber, `unknown operation "${operation}"`)
    }

    return createCalculation({
      operation,
      a: parseNumber(cell('operand_a'), 'operand_a', rowNumber),
      b: parseNumber(cell('operand_b'), 'operand_b', rowNumber),
      result: parseNumber(cell('result'), 'result', rowNumber),
      timestamp: parseTimestamp(cell('timestamp'), rowNumber),
    })
  })
}
