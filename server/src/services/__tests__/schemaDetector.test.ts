import { describe, test, expect } from 'vitest'
import { detectCountryField, detectRegistrationDateField, detectSchema, detectWeightField } from '../schemaDetector.js'

describe('Schema Detector', () => {
  test('should find the weight column case-insensitively', () => {
    expect(detectWeightField(['Mark', 'Maximum Take-Off WEIGHT (kg)'])).toBe('Maximum Take-Off WEIGHT (kg)')
    expect(detectWeightField(['Mark', 'Common Name'])).toBeNull()
  })

  test('should take the first matching weight column', () => {
    expect(detectWeightField(['Weight (kg)', 'Weight (lb)'])).toBe('Weight (kg)')
  })

  test('should require both country and manufact in the country column', () => {
    expect(detectCountryField(['Country', 'Country of Manufacture'])).toBe('Country of Manufacture')
    expect(detectCountryField(['Manufacturer Country Code'])).toBe('Manufacturer Country Code')
    expect(detectCountryField(['Country', "Manufacturer's Name"])).toBeNull()
  })

  test('should prefer the issue date over the modified date', () => {
    expect(detectRegistrationDateField(['Modified Date', 'Issue Date'])).toBe('Issue Date')
    expect(detectRegistrationDateField(['Modified Date'])).toBe('Modified Date')
    expect(detectRegistrationDateField(['Mark'])).toBeNull()
  })

  test('should resolve every role in one descriptor', () => {
    const columns = ['Mark', 'Weight (kg)', 'Country of Manufacture', 'Issue Date']

    expect(detectSchema(columns)).toEqual({
      columns,
      weightField: 'Weight (kg)',
      countryField: 'Country of Manufacture',
      registrationDateField: 'Issue Date'
    })
  })
})
