import { CsvTable, parseCsvText, readTextFile } from '../csv'
import { debug, describeError, warn } from '../logger'
import defaultConfig from './config'
import { CatalogFormatError } from './errors'
import { ControlCatalog, ControlRecord } from './types'

export interface CatalogOptions {
  idColumn?: string
  descriptionColumn?: string
  /** Name used in error messages, usually the file path. */
  source?: string
}

function columnIndex(columns: string[], name: string, source: string): number {
  const index = columns.indexOf(name)
  if (index === -1) {
    throw new CatalogFormatError(
      `Catalog ${source} has no ${JSON.stringify(name)} column (columns: ${columns.map((c) => JSON.stringify(c)).join(', ') || 'none'})`,
      { source, column: name, columns }
    )
  }
  return index
}

/**
 * Turn a parsed table into Control Records.
 *
 * Duplicate ids: the last row wins. Its content replaces the earlier record,
 * which keeps the position of the first occurrence, and a warning is logged.
 */
export function catalogFromTable(table: CsvTable, options: CatalogOptions = {}): ControlCatalog {
  const source = options.source ?? '<input>'
  const idColumn = options.idColumn ?? defaultConfig.idColumn
  const descriptionColumn = options.descriptionColumn ?? defaultConfig.descriptionColumn

  if (table.columns.length === 0) {
    throw new CatalogFormatError(`Catalog ${source} is empty`, { source })
  }
  const idIndex = columnIndex(table.columns, idColumn, source)
  const descriptionIndex = columnIndex(table.columns, descriptionColumn, source)
  if (table.rows.length === 0) {
    throw new CatalogFormatError(`Catalog ${source} has a header but no controls`, { source })
  }

  const records: ControlRecord[] = []
  const positions = new Map<string, number>()

  for (const { line, values } of table.rows) {
    const id = values[idIndex] ?? ''
    if (!id) {
      throw new CatalogFormatError(`Catalog ${source} row ${line} has an empty ${JSON.stringify(idColumn)}`, {
        source,
        row: line,
        column: idColumn
      })
    }

    const attributes = Object.fromEntries(
      table.columns
        .map((column, i): [string, string] => [column, values[i] ?? ''])
        .filter(([column], i) => i !== idIndex && i !== descriptionIndex && column !== '')
    )
    const record: ControlRecord = {
      id,
      description: values[descriptionIndex] ?? '',
      attributes: Object.freeze(attributes),
      row: line
    }
    if (!record.description) warn(`Control ${id} (row ${line}) has an empty description`)

    const existing = positions.get(id)
    if (existing === undefined) {
      positions.set(id, records.length)
      records.push(record)
    } else {
      warn(`Duplicate control id ${id} at row ${line} replaces row ${records[existing].row}`)
      records[existing] = record
    }
  }

  debug('Catalog loaded', { source, controls: records.length })
  return Object.freeze(records.map((r) => Object.freeze(r)))
}

export function parseCatalog(text: string, options: CatalogOptions = {}): ControlCatalog {
  const source = options.source ?? '<input>'
  let table: CsvTable
  try {
    table = parseCsvText(text)
  } catch (err) {
    throw new CatalogFormatError(`Catalog ${source} is not valid CSV: ${describeError(err)}`, { source }, { cause: err })
  }
  return catalogFromTable(table, { ...options, source })
}

export async function loadCatalogFromFile(filePath: string, options: CatalogOptions = {}): Promise<ControlCatalog> {
  return parseCatalog(await readTextFile(filePath), { source: filePath, ...options })
}
