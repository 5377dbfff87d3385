import { CANADA_PROVINCES, REGISTRY_COLUMNS } from '../config/registryColumns.js'
import {
  CellValue,
  FilterOptions,
  FilterSpec,
  NumericRange,
  RegistryRecord,
  RegistrySchema,
  RegistryTable
} from '../types/registry.js'
import { cellText } from '../utils/valueParser.js'

type RecordPredicate = (record: Readonly<RegistryRecord>) => boolean

const cellOf = (record: Readonly<RegistryRecord>, field: string): CellValue => record[field] ?? null

/**
 * Set membership on the cell's text form. An empty selection is no filter.
 */
const membership = (field: string, selection: readonly string[]): RecordPredicate | null => {
  if (selection.length === 0) return null
  const selected = new Set(selection)
  return record => {
    const text = cellText(cellOf(record, field))
    return text !== null && selected.has(text)
  }
}

/**
 * Inclusive range. A missing value never passes, even when the range spans
 * every observed value.
 */
const inRange = (field: string, range: Readonly<NumericRange>): RecordPredicate => record => {
  const value = cellOf(record, field)
  return typeof value === 'number' && value >= range.min && value <= range.max
}

const textSearch = (fields: readonly string[], query: string): RecordPredicate | null => {
  if (!query.trim()) return null
  const needle = query.toLowerCase()
  return record => fields.some(field => {
    const text = cellText(cellOf(record, field))
    return text !== null && text.toLowerCase().includes(needle)
  })
}

/**
 * Builds the conjunction for a filter spec. Categorical filters come first,
 * then the mandatory ranges, the weight range and the text search.
 */
export function buildPredicates(spec: FilterSpec, schema: RegistrySchema): RecordPredicate[] {
  const candidates: Array<RecordPredicate | null> = [
    membership(REGISTRY_COLUMNS.province, spec.provinces),
    membership(REGISTRY_COLUMNS.category, spec.categories),
    membership(REGISTRY_COLUMNS.ownerType, spec.ownerTypes),
    membership(REGISTRY_COLUMNS.engineCategory, spec.engineCategories),
    schema.countryField ? membership(schema.countryField, spec.countries) : null,
    inRange(REGISTRY_COLUMNS.engineCount, spec.engineCount),
    inRange(REGISTRY_COLUMNS.yearOfManufacture, spec.yearOfManufacture),
    inRange(REGISTRY_COLUMNS.aircraftAge, spec.aircraftAge),
    schema.weightField && spec.weight ? inRange(schema.weightField, spec.weight) : null,
    textSearch([REGISTRY_COLUMNS.commonName, REGISTRY_COLUMNS.modelName], spec.search)
  ]

  return candidates.filter((predicate): predicate is RecordPredicate => predicate !== null)
}

/**
 * Returns the records that satisfy every filter, in input order. The input is
 * never modified.
 */
export function applyFilters(table: RegistryTable, spec: FilterSpec, schema: RegistrySchema): RegistryTable {
  const predicates = buildPredicates(spec, schema)
  if (predicates.length === 0) return table
  return table.filter(record => predicates.every(predicate => predicate(record)))
}

export function observedRange(table: RegistryTable, field: string): NumericRange | null {
  let min = Infinity
  let max = -Infinity

  for (const record of table) {
    const value = cellOf(record, field)
    if (typeof value !== 'number') continue
    if (value < min) min = value
    if (value > max) max = value
  }

  return min === Infinity ? null : { min, max }
}

const defaultRange = (table: RegistryTable, field: string): NumericRange => {
  const range = observedRange(table, field)
  if (!range) return { min: 0, max: 0 }
  return { min: Math.floor(range.min), max: Math.ceil(range.max) }
}

/**
 * The filters a fresh session starts from: nothing selected, every range
 * spanning the observed values.
 */
export function defaultFilterSpec(table: RegistryTable, schema: RegistrySchema): FilterSpec {
  return {
    provinces: [],
    categories: [],
    ownerTypes: [],
    engineCategories: [],
    countries: [],
    engineCount: defaultRange(table, REGISTRY_COLUMNS.engineCount),
    yearOfManufacture: defaultRange(table, REGISTRY_COLUMNS.yearOfManufacture),
    aircraftAge: defaultRange(table, REGISTRY_COLUMNS.aircraftAge),
    weight: schema.weightField ? defaultRange(table, schema.weightField) : null,
    search: ''
  }
}

export function distinctValues(table: RegistryTable, field: string): string[] {
  const values = new Set<string>()
  for (const record of table) {
    const text = cellText(cellOf(record, field))
    if (text !== null) values.add(text)
  }
  return [...values].sort()
}

export function filterOptions(table: RegistryTable, schema: RegistrySchema): FilterOptions {
  return {
    provinces: [...CANADA_PROVINCES],
    categories: distinctValues(table, REGISTRY_COLUMNS.category),
    ownerTypes: distinctValues(table, REGISTRY_COLUMNS.ownerType),
    engineCategories: distinctValues(table, REGISTRY_COLUMNS.engineCategory),
    countries: schema.countryField ? distinctValues(table, schema.countryField) : []
  }
}

/**
 * Copy of the table with every literal "null" cell turned into a missing
 * value. Used after filtering, for display, export and summaries.
 */
export function normalizeNullLiterals(table: RegistryTable): RegistryRecord[] {
  return table.map(record => {
    const normalized: RegistryRecord = {}
    for (const [field, value] of Object.entries(record)) {
      normalized[field] = value === 'null' ? null : value
    }
    return normalized
  })
}
