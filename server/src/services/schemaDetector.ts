import { REGISTRY_COLUMNS } from '../config/registryColumns.js'
import { RegistrySchema } from '../types/registry.js'

export function detectWeightField(columns: readonly string[]): string | null {
  return columns.find(column => column.toLowerCase().includes('weight')) ?? null
}

export function detectCountryField(columns: readonly string[]): string | null {
  return columns.find(column => {
    const lower = column.toLowerCase()
    return lower.includes('country') && lower.includes('manufact')
  }) ?? null
}

export function detectRegistrationDateField(columns: readonly string[]): string | null {
  if (columns.includes(REGISTRY_COLUMNS.issueDate)) return REGISTRY_COLUMNS.issueDate
  if (columns.includes(REGISTRY_COLUMNS.modifiedDate)) return REGISTRY_COLUMNS.modifiedDate
  return null
}

/**
 * Resolves the column roles that vary between registry extracts. Runs once
 * over the joined header.
 */
export function detectSchema(columns: readonly string[]): RegistrySchema {
  return {
    columns: [...columns],
    weightField: detectWeightField(columns),
    countryField: detectCountryField(columns),
    registrationDateField: detectRegistrationDateField(columns)
  }
}
