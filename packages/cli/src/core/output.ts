import { inspect } from 'node:util'

export const OUTPUT_FORMATS = ['json', 'text', 'table'] as const

export type OutputFormat = (typeof OUTPUT_FORMATS)[number]

export const isOutputFormat = (value: unknown): value is OutputFormat =>
  OUTPUT_FORMATS.some((format) => format === value)

/**
 * Writable end of a stream. `process.stdout` satisfies it, and so does a
 * plain capture object in tests.
 */
export interface TextSink {
  write(chunk: string): unknown
  isTTY?: boolean
}

export type TableColumn = string | { key: string; label?: string }
export type TableRow = Record<string, unknown>

export interface OutputFormatter {
  /** Command result, on stdout */
  data(value: unknown): void
  table(rows: TableRow[], columns?: TableColumn[]): void
  /** Status lines, on stderr, hidden by --quiet */
  message(text: string): void
  success(text: string): void
  warn(text: string): void
  error(text: string): void
  /** Only with --verbose */
  progress(label: string): void
}

export interface OutputFormatterConfig {
  format?: OutputFormat
  stdout: TextSink
  stderr: TextSink
  verbose?: boolean
  quiet?: boolean
}

const valueToCell = (value: unknown): string => {
  if (value === null || value === undefined) return ''
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }
  if (Array.isArray(value) && value.every((v) => typeof v === 'string')) {
    return value.join(', ')
  }
  return JSON.stringify(value)
}

const normalizeColumns = (
  columns: TableColumn[] | undefined,
  rows: TableRow[]
): { key: string; label: string }[] => {
  if (columns && columns.length > 0) {
    return columns.map((column) =>
      typeof column === 'string'
        ? { key: column, label: column }
        : { key: column.key, label: column.label ?? column.key }
    )
  }
  const [firstRow] = rows
  if (!firstRow) return []
  return Object.keys(firstRow).map((key) => ({ key, label: key }))
}

/**
 * Left-aligned columns separated by two spaces, header first.
 */
export const renderTable = (
  rows: TableRow[],
  columns?: TableColumn[]
): string[] => {
  const normalized = normalizeColumns(columns, rows)
  if (normalized.length === 0) return []

  const cells = rows.map((row) =>
    normalized.map((column) => valueToCell(row[column.key]))
  )
  const widths = normalized.map((column, index) =>
    Math.max(column.label.length, ...cells.map((line) => line[index]?.length ?? 0))
  )
  const renderLine = (values: string[]) =>
    values
      .map((value, index) => value.padEnd(widths[index] ?? 0, ' '))
      .join('  ')
      .trimEnd()

  return [
    renderLine(normalized.map((column) => column.label)),
    ...cells.map(renderLine),
  ]
}

const isRow = (value: unknown): value is TableRow =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const isRowArray = (value: unknown): value is TableRow[] =>
  Array.isArray(value) && value.every(isRow)

const formatHumanReadable = (value: unknown): string => {
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }
  return inspect(value, { depth: null, colors: false })
}

export const resolveOutputFormat = (
  format: OutputFormat | undefined,
  stdout: TextSink
): OutputFormat => {
  if (format) return format
  return stdout.isTTY ? 'text' : 'json'
}

export const createOutputFormatter = (
  config: OutputFormatterConfig
): OutputFormatter => {
  const format = resolveOutputFormat(config.format, config.stdout)

  switch (format) {
    case 'json':
      return new JsonFormatter(config)
    case 'table':
      return new TableFormatter(config)
    default:
      return new TextFormatter(config)
  }
}

abstract class BaseFormatter implements OutputFormatter {
  protected stdout: TextSink
  protected stderr: TextSink
  protected verbose: boolean
  protected quiet: boolean

  constructor(config: OutputFormatterConfig) {
    this.stdout = config.stdout
    this.stderr = config.stderr
    this.verbose = config.verbose ?? false
    this.quiet = config.quiet ?? false
  }

  abstract data(value: unknown): void

  table(rows: TableRow[], columns?: TableColumn[]): void {
    for (const line of renderTable(rows, columns)) {
      this.writeStdout(line)
    }
  }

  message(text: string): void {
    if (!this.quiet) this.writeStderr(text)
  }

  success(text: string): void {
    if (!this.quiet) this.writeStderr(`SUCCESS: ${text}`)
  }

  warn(text: string): void {
    if (!this.quiet) this.writeStderr(`WARN: ${text}`)
  }

  error(text: string): void {
    this.writeStderr(`ERROR: ${text}`)
  }

  progress(label: string): void {
    if (this.verbose && !this.quiet) this.writeStderr(label)
  }

  protected writeStdout(line: string): void {
    this.stdout.write(`${line}\n`)
  }

  protected writeStderr(line: string): void {
    this.stderr.write(`${line}\n`)
  }
}

export class JsonFormatter extends BaseFormatter {
  data(value: unknown): void {
    this.writeStdout(JSON.stringify(value))
  }

  override table(rows: TableRow[], columns?: TableColumn[]): void {
    this.data({
      columns: normalizeColumns(columns, rows).map((column) => column.label),
      rows,
    })
  }
}

export class TextFormatter extends BaseFormatter {
  data(value: unknown): void {
    this.writeStdout(formatHumanReadable(value))
  }
}

export class TableFormatter extends BaseFormatter {
  data(value: unknown): void {
    if (isRowArray(value)) {
      this.table(value)
      return
    }
    this.writeStdout(formatHumanReadable(value))
  }
}
