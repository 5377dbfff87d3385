export const REGISTRY_COLUMNS = {
  mark: 'Mark',
  ownerMark: 'Registration Mark',
  province: 'Province (English)',
  category: 'Aircraft Category',
  ownerType: 'Type of Owner',
  engineCategory: 'Engine Category',
  engineCount: 'Number of Engines',
  yearOfManufacture: 'Year of Manufacture/Assembly',
  aircraftAge: 'Aircraft Age',
  issueDate: 'Issue Date',
  modifiedDate: 'Modified Date',
  registrationYear: 'Reg Year',
  commonName: 'Common Name',
  modelName: 'Model Name',
  manufacturer: "Manufacturer's Name"
} as const

export const CANADA_PROVINCES: readonly string[] = [
  'British Columbia',
  'Alberta',
  'Saskatchewan',
  'Manitoba',
  'Ontario',
  'Quebec',
  'New Brunswick',
  'Nova Scotia',
  'Prince Edward Island',
  'Newfoundland and Labrador',
  'Yukon',
  'Northwest Territories',
  'Nunavut'
]

export const NUMERIC_COLUMNS: readonly string[] = [
  REGISTRY_COLUMNS.engineCount,
  REGISTRY_COLUMNS.aircraftAge,
  REGISTRY_COLUMNS.yearOfManufacture
]
