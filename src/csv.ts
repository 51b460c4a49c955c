import fs from 'fs/promises'
import { parse } from 'csv-parse/sync'
import appRoot from 'app-root-path'
import path from 'path'
import { debug } from './logger'

export type CsvRow = {
  /** Source line the record ends on (1-based). */
  line: number
  values: string[]
}

export type CsvTable = {
  columns: string[]
  rows: CsvRow[]
}

type ParsedRecord = { record: string[]; info: { lines: number } }

function isParsedRecord(value: unknown): value is ParsedRecord {
  if (!value || typeof value !== 'object') return false
  if (!('record' in value) || !('info' in value)) return false
  const { record, info } = value
  return (
    Array.isArray(record) &&
    record.every((v) => typeof v === 'string') &&
    !!info &&
    typeof info === 'object' &&
    'lines' in info &&
    typeof info.lines === 'number'
  )
}

/**
 * Parse CSV text whose first record is the header. Blank records, including
 * lines made only of separators, are dropped. Parser failures propagate.
 */
export function parseCsvText(text: string): CsvTable {
  const parsed: unknown = parse(text, {
    bom: true,
    info: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true
  })
  if (!Array.isArray(parsed)) throw new Error('CSV parser returned no records')

  const records: CsvRow[] = []
  for (const entry of parsed) {
    if (!isParsedRecord(entry)) throw new Error('CSV parser returned an unexpected record shape')
    if (entry.record.every((v) => v === '')) continue
    records.push({ line: entry.info.lines, values: entry.record })
  }

  const [header, ...rows] = records
  debug('CSV parsed', { columns: header?.values.length ?? 0, rows: rows.length })
  return { columns: header ? header.values : [], rows }
}

const root = appRoot.path

export function resolveProjectPath(filePath: string) {
  return path.resolve(root, filePath)
}

export async function readTextFile(filePath: string): Promise<string> {
  const absPath = resolveProjectPath(filePath)
  debug('Reading', absPath)
  return fs.readFile(absPath, 'utf-8')
}
