import * as XLSX from 'xlsx'
import { RegistryTable } from '../types/registry.js'

/**
 * Renders records as CSV with the given column order. Missing cells are
 * written as empty fields.
 */
export function tableToCsv(table: RegistryTable, columns: readonly string[]): string {
  const sheet = XLSX.utils.json_to_sheet([...table], { header: [...columns] })
  return XLSX.utils.sheet_to_csv(sheet)
}
