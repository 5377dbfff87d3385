import { CANADA_PROVINCES, NUMERIC_COLUMNS, REGISTRY_COLUMNS } from '../config/registryColumns.js'
import { describeSource, RegistrySourceConfig, TableSource } from '../config/registry.js'
import { LoadedRegistry, RawTable, RegistryRecord, RegistrySchema } from '../types/registry.js'
import { uniqueColumnName } from '../utils/columnNames.js'
import { RegistryLoadError } from '../utils/errors.js'
import { cellText, parseCalendarYear, toNumeric } from '../utils/valueParser.js'
import { parseDelimitedFile } from './fileParser.js'
import { parseSpreadsheetSheet } from './spreadsheetParser.js'
import { detectSchema } from './schemaDetector.js'
import { defaultFilterSpec, filterOptions } from './filterEngine.js'

export interface JoinKeys {
  left: string
  right: string
}

export interface JoinedTable {
  columns: string[]
  rows: RegistryRecord[]
}

export async function readSource(source: TableSource): Promise<RawTable> {
  return source.kind === 'sheet'
    ? parseSpreadsheetSheet(source.path, source.sheet)
    : parseDelimitedFile(source.path, describeSource(source), source.delimiter)
}

const joinKey = (record: RegistryRecord, column: string): string | null => {
  const text = cellText(record[column] ?? null)
  return text === null ? null : text.trim()
}

/**
 * Left-outer join on a string key. Every left row survives; a key matched by
 * several right rows yields one row per match. Right columns that collide
 * with a left column get a numeric suffix.
 */
export function joinTables(left: RawTable, right: RawTable, keys: JoinKeys): JoinedTable {
  if (!left.columns.includes(keys.left)) {
    throw new RegistryLoadError(left.name, `join key column '${keys.left}' not found`)
  }
  if (!right.columns.includes(keys.right)) {
    throw new RegistryLoadError(right.name, `join key column '${keys.right}' not found`)
  }

  const usedNames = new Set(left.columns)
  const baseNameCounts = new Map<string, number>()
  const rightColumns: Array<{ source: string; target: string }> = []
  right.columns.forEach((column, index) => {
    const target = usedNames.has(column)
      ? uniqueColumnName(column, index, usedNames, baseNameCounts)
      : column
    usedNames.add(target)
    rightColumns.push({ source: column, target })
  })

  const rightByKey = new Map<string, RegistryRecord[]>()
  for (const row of right.rows) {
    const key = joinKey(row, keys.right)
    if (key === null) continue
    const bucket = rightByKey.get(key)
    if (bucket) {
      bucket.push(row)
    } else {
      rightByKey.set(key, [row])
    }
  }

  const rows: RegistryRecord[] = []
  for (const leftRow of left.rows) {
    const key = joinKey(leftRow, keys.left)
    const matches = key === null ? undefined : rightByKey.get(key)

    if (!matches) {
      const row: RegistryRecord = { ...leftRow }
      for (const { target } of rightColumns) row[target] = null
      rows.push(row)
      continue
    }

    for (const match of matches) {
      const row: RegistryRecord = { ...leftRow }
      for (const { source, target } of rightColumns) row[target] = match[source] ?? null
      rows.push(row)
    }
  }

  return {
    columns: [...left.columns, ...rightColumns.map(column => column.target)],
    rows
  }
}

/**
 * Coerces the numeric columns and adds the registration year. Cells that do
 * not parse become missing.
 */
export function deriveColumns(rows: RegistryRecord[], schema: RegistrySchema): RegistryRecord[] {
  const numericColumns = schema.weightField
    ? [...NUMERIC_COLUMNS, schema.weightField]
    : NUMERIC_COLUMNS
  const dateField = schema.registrationDateField

  return rows.map(row => {
    const derived: RegistryRecord = { ...row }
    for (const column of numericColumns) {
      derived[column] = toNumeric(row[column])
    }
    derived[REGISTRY_COLUMNS.registrationYear] = dateField ? parseCalendarYear(row[dateField]) : null
    return derived
  })
}

export function restrictToProvinces(rows: RegistryRecord[]): RegistryRecord[] {
  const provinces = new Set(CANADA_PROVINCES)
  return rows.filter(row => {
    const province = row[REGISTRY_COLUMNS.province]
    return typeof province === 'string' && provinces.has(province)
  })
}

const warnAbsentColumns = (columns: readonly string[]): void => {
  const expected = [
    REGISTRY_COLUMNS.province,
    REGISTRY_COLUMNS.category,
    REGISTRY_COLUMNS.ownerType,
    REGISTRY_COLUMNS.engineCategory,
    ...NUMERIC_COLUMNS,
    REGISTRY_COLUMNS.commonName,
    REGISTRY_COLUMNS.modelName,
    REGISTRY_COLUMNS.manufacturer
  ]
  const absent = expected.filter(column => !columns.includes(column))
  if (absent.length > 0) {
    console.warn(`[registry] columns not found, their values are missing: ${absent.join(', ')}`)
  }
}

/**
 * Builds the registry from two already-read tables: join, schema detection,
 * derived columns, province restriction. Records are frozen.
 */
export function buildRegistry(current: RawTable, owners: RawTable): LoadedRegistry {
  const joined = joinTables(current, owners, {
    left: REGISTRY_COLUMNS.mark,
    right: REGISTRY_COLUMNS.ownerMark
  })

  warnAbsentColumns(joined.columns)

  const detected = detectSchema(joined.columns)
  const schema: RegistrySchema = {
    ...detected,
    columns: detected.columns.includes(REGISTRY_COLUMNS.registrationYear)
      ? detected.columns
      : [...detected.columns, REGISTRY_COLUMNS.registrationYear]
  }

  const rows = restrictToProvinces(deriveColumns(joined.rows, schema))
  const records = Object.freeze(rows.map(row => Object.freeze(row)))

  return {
    records,
    schema,
    defaults: defaultFilterSpec(records, schema),
    options: filterOptions(records, schema)
  }
}

export async function loadRegistry(sources: RegistrySourceConfig): Promise<LoadedRegistry> {
  const [current, owners] = await Promise.all([
    readSource(sources.current),
    readSource(sources.owners)
  ])

  console.log(
    `[registry] read ${current.rows.length} current registrations from ${describeSource(sources.current)}, ` +
    `${owners.rows.length} owner records from ${describeSource(sources.owners)}`
  )

  const registry = buildRegistry(current, owners)
  const { schema } = registry

  console.log(
    `[registry] ${registry.records.length} records in scope; ` +
    `weight column: ${schema.weightField ?? 'none'}, ` +
    `country column: ${schema.countryField ?? 'none'}, ` +
    `registration date column: ${schema.registrationDateField ?? 'none'}`
  )

  return registry
}
