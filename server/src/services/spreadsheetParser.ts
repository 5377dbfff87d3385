import * as XLSX from 'xlsx'
import { readFile } from 'fs/promises'
import { RawTable, RegistryRecord } from '../types/registry.js'
import { uniqueColumnNames } from '../utils/columnNames.js'
import { normalizeCell } from '../utils/valueParser.js'
import { RegistryLoadError } from '../utils/errors.js'

async function readWorkbook(filePath: string, sourceLabel: string): Promise<XLSX.WorkBook> {
  let buffer: Buffer
  try {
    buffer = await readFile(filePath)
  } catch (error) {
    throw new RegistryLoadError(sourceLabel, `cannot read workbook ${filePath}`, { cause: error })
  }

  try {
    return XLSX.read(buffer, { type: 'buffer', cellDates: true })
  } catch (error) {
    throw new RegistryLoadError(sourceLabel, `malformed workbook ${filePath}`, { cause: error })
  }
}

function sheetRows(sheet: XLSX.WorkSheet): unknown[][] {
  return XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, blankrows: false, defval: null })
}

/**
 * Reads one sheet into a raw table. The first row is the header; cells beyond
 * a short row are missing.
 */
export async function parseSpreadsheetSheet(filePath: string, sheetName: string): Promise<RawTable> {
  const workbook = await readWorkbook(filePath, sheetName)
  const sheet = workbook.Sheets[sheetName]

  if (!sheet) {
    throw new RegistryLoadError(
      sheetName,
      `sheet not found in ${filePath} (available: ${workbook.SheetNames.join(', ')})`
    )
  }

  const rows = sheetRows(sheet)
  if (rows.length === 0) {
    return { name: sheetName, columns: [], rows: [] }
  }

  const columns = uniqueColumnNames(rows[0])
  const records = rows.slice(1).map(row => {
    const record: RegistryRecord = {}
    columns.forEach((column, index) => {
      record[column] = normalizeCell(row[index])
    })
    return record
  })

  return { name: sheetName, columns, rows: records }
}
