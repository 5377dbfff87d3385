/**
 * Shared shapes for the joined aircraft registry table.
 */

/** `null` stands for a missing value, distinct from zero or the empty string. */
export type CellValue = string | number | null

export type RegistryRecord = Record<string, CellValue>

export type RegistryTable = ReadonlyArray<Readonly<RegistryRecord>>

/**
 * A source table as read from a workbook sheet or a delimited file.
 * `columns` keeps the header order of the source.
 */
export interface RawTable {
  name: string
  columns: string[]
  rows: RegistryRecord[]
}

/**
 * Column roles resolved once at load time. Later stages read field names from
 * here instead of scanning the header.
 */
export interface RegistrySchema {
  columns: string[]
  weightField: string | null
  countryField: string | null
  registrationDateField: string | null
}

export interface NumericRange {
  min: number
  max: number
}

export interface FilterSpec {
  readonly provinces: readonly string[]
  readonly categories: readonly string[]
  readonly ownerTypes: readonly string[]
  readonly engineCategories: readonly string[]
  readonly countries: readonly string[]
  readonly engineCount: Readonly<NumericRange>
  readonly yearOfManufacture: Readonly<NumericRange>
  readonly aircraftAge: Readonly<NumericRange>
  readonly weight: Readonly<NumericRange> | null
  readonly search: string
}

export interface FilterOptions {
  provinces: string[]
  categories: string[]
  ownerTypes: string[]
  engineCategories: string[]
  countries: string[]
}

export interface LoadedRegistry {
  records: RegistryTable
  schema: RegistrySchema
  defaults: FilterSpec
  options: FilterOptions
}
