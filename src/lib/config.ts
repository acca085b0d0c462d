/**
 * Calculator Configuration
 *
 * Read from environment variables:
 * - CALCULATOR_HISTORY_DIR        directory for the history file (default ./history)
 * - CALCULATOR_HISTORY_FILE       history file path (default <dir>/calculator_history.csv)
 * - CALCULATOR_MAX_HISTORY_SIZE   records kept before the oldest is evicted (default 100)
 * - CALCULATOR_AUTO_SAVE          save after every mutation (default true)
 * - CALCULATOR_DEFAULT_ENCODING   text encoding of the history file (default utf-8)
 * - CALCULATOR_CSV_DELIMITER      field delimiter of the history file (default ,)
 * - CALCULATOR_LOG_LEVEL          debug | info | warn | error | silent (default info)
 * - CALCULATOR_LOAD_ON_START      load the history file on start-up (default true)
 */

import path from 'node:path'
import { z } from 'zod'
import { ConfigurationError } from './errors'
import { LOG_LEVELS, type LogLevel } from './logger'

export interface CalculatorConfig {
  historyDir: string
  historyFile: string
  maxHistorySize: number
  autoSave: boolean
  defaultEncoding: BufferEncoding
  csvDelimiter: string
  logLevel: LogLevel
  loadOnStart: boolean
}

export const DEFAULT_HISTORY_FILENAME = 'calculator_history.csv'

const TRUE_VALUES = ['true', '1', 'yes', 'on']
const FALSE_VALUES = ['false', '0', 'no', 'off']

const booleanFlag = z.union([
  z.boolean(),
  z.string()
    .transform((value) => value.trim().toLowerCase())
    .refine(
      (value) => TRUE_VALUES.includes(value) || FALSE_VALUES.includes(value),
      { message: `Expected one of ${[...TRUE_VALUES, ...FALSE_VALUES].join(', ')}` }
    )
    .transform((value) => TRUE_VALUES.includes(value)),
])

// Binary-to-text encodings (hex, base64) would write an empty file
export const TEXT_ENCODINGS = [
  'utf-8',
  'utf8',
  'utf16le',
  'utf-16le',
  'latin1',
  'ascii',
] as const satisfies readonly BufferEncoding[]

const encoding = z.string().pipe(
  z.enum(TEXT_ENCODINGS, {
    errorMap: () => ({ message: `Unsupported text encoding, expected one of ${TEXT_ENCODINGS.join(', ')}` }),
  })
)

const positiveInteger = z.union([z.number(), z.string()])
  .pipe(z.coerce.number().int().positive())

const delimiter = z.string()
  .length(1, { message: 'Delimiter must be a single character' })
  .refine((value) => value !== '"' && value !== '\n' && value !== '\r', {
    message: 'Delimiter cannot be a quote or a line break',
  })

const configSchema = z.object({
  historyDir: z.string().min(1).default('history'),
  historyFile: z.string().min(1).optional(),
  maxHistorySize: positiveInteger.default(100),
  autoSave: booleanFlag.default(true),
  defaultEncoding: encoding.default('utf-8'),
  csvDelimiter: delimiter.default(','),
  logLevel: z.string().pipe(z.enum(LOG_LEVELS)).default('info'),
  loadOnStart: booleanFlag.default(true),
})

export type CalculatorConfigInput = z.input<typeof configSchema>

function formatIssues(error: z.ZodError): string {
  const lines = error.issues.map((issue) => {
    const field = issue.path.join('.')
    return field ? `${field}: ${issue.message}` : issue.message
  })
  return `Invalid calculator configuration:\n- ${lines.join('\n- ')}`
}

/**
 * Build a validated config from explicit values. Unset fields take defaults.
 */
export function createCalculatorConfig(input: CalculatorConfigInput = {}): CalculatorConfig {
  const parsed = configSchema.safeParse(input)
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error))
  }

  const { historyFile, ...rest } = parsed.data
  const historyDir = path.resolve(rest.historyDir)

  return {
    ...rest,
    historyDir,
    historyFile: historyFile
      ? path.resolve(historyFile)
      : path.join(historyDir, DEFAULT_HISTORY_FILENAME),
  }
}

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]
  return value === undefined || value.trim() === '' ? undefined : value
}

export function loadCalculatorConfig(env: NodeJS.ProcessEnv = process.env): CalculatorConfig {
  return createCalculatorConfig({
    historyDir: readEnv(env, 'CALCULATOR_HISTORY_DIR'),
    historyFile: readEnv(env, 'CALCULATOR_HISTORY_FILE'),
    maxHistorySize: readEnv(env, 'CALCULATOR_MAX_HISTORY_SIZE'),
    autoSave: readEnv(env, 'CALCULATOR_AUTO_SAVE'),
    defaultEncoding: readEnv(env, 'CALCULATOR_DEFAULT_ENCODING'),
    csvDelimiter: readEnv(env, 'CALCULATOR_CSV_DELIMITER'),
    logLevel: readEnv(env, 'CALCULATOR_LOG_LEVEL'),
    loadOnStart: readEnv(env, 'CALCULATOR_LOAD_ON_START'),
  })
}
