import { describe, test, expect, beforeEach, vi } from 'vitest'
import {
  applyFilters,
  buildPredicates,
  defaultFilterSpec,
  distinctValues,
  normalizeNullLiterals,
  observedRange
} from '../filterEngine.js'
import { buildRegistry } from '../registryLoader.js'
import { FilterSpec, LoadedRegistry, RegistrySchema } from '../../types/registry.js'
import { currentTable, ownerTable } from '../../__tests__/fixtures/registryFixtures.js'

const marks = (table: ReadonlyArray<Readonly<Record<string, unknown>>>) => table.map(record => record.Mark)

describe('Filter Engine', () => {
  let registry: LoadedRegistry

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    registry = buildRegistry(currentTable(), ownerTable())
  })

  const filter = (overrides: Partial<FilterSpec>) =>
    applyFilters(registry.records, { ...registry.defaults, ...overrides }, registry.schema)

  describe('default filters', () => {
    test('should keep every record with known engines, year, age and weight', () => {
      expect(marks(filter({}))).toEqual(['C-FAAA', 'C-FBBB', 'C-GCCC', 'C-FEEE', 'C-FEEE'])
    })

    test('should be idempotent', () => {
      const once = applyFilters(registry.records, registry.defaults, registry.schema)
      const twice = applyFilters(once, registry.defaults, registry.schema)

      expect(twice).toEqual(once)
    })

    test('should return a subset of the input without copying records', () => {
      const result = filter({ provinces: ['Ontario'] })

      for (const record of result) {
        expect(registry.records).toContain(record)
      }
    })
  })

  describe('set membership', () => {
    test('should match any selected province', () => {
      expect(marks(filter({ provinces: ['Quebec', 'British Columbia'] }))).toEqual(['C-FBBB', 'C-GCCC'])
    })

    test('should combine categorical filters with AND', () => {
      expect(marks(filter({ categories: ['Aeroplane'], ownerTypes: ['Entity'] }))).toEqual(['C-FBBB'])
    })

    test('should filter on engine category and country', () => {
      expect(marks(filter({ engineCategories: ['Turbo Shaft'] }))).toEqual(['C-GCCC'])
      expect(marks(filter({ countries: ['United States'] }))).toEqual(['C-FAAA', 'C-FBBB'])
    })

    test('should yield nothing for a selection no record has', () => {
      expect(filter({ categories: ['Balloon'] })).toEqual([])
    })

    test('should ignore the country selection when no country column exists', () => {
      const schema: RegistrySchema = { ...registry.schema, countryField: null }
      const result = applyFilters(registry.records, { ...registry.defaults, countries: ['Canada'] }, schema)

      expect(result).toHaveLength(5)
    })
  })

  describe('ranges', () => {
    test('should include both bounds', () => {
      expect(marks(filter({ aircraftAge: { min: 17, max: 20 } }))).toEqual(['C-FAAA', 'C-FEEE', 'C-FEEE'])
    })

    test('should exclude missing values even for the full observed range', () => {
      const records = [
        { Mark: 'A', 'Aircraft Age': 5 },
        { Mark: 'B', 'Aircraft Age': null },
        { Mark: 'C', 'Aircraft Age': 20 }
      ]
      const predicates = buildPredicates({ ...registry.defaults, aircraftAge: { min: 0, max: 20 } }, registry.schema)
      const agePredicate = predicates[2]

      // engine count, manufacture year, age, weight
      expect(predicates).toHaveLength(4)
      expect(records.filter(agePredicate).map(record => record.Mark)).toEqual(['A', 'C'])
    })

    test('should filter on weight when a weight column exists', () => {
      expect(marks(filter({ weight: { min: 1000, max: 1500 } }))).toEqual(['C-FAAA', 'C-GCCC', 'C-FEEE', 'C-FEEE'])
    })

    test('should skip the weight range without a weight column', () => {
      const schema: RegistrySchema = { ...registry.schema, weightField: null }
      const spec = { ...registry.defaults, weight: { min: 0, max: 1 } }

      expect(applyFilters(registry.records, spec, schema)).toHaveLength(5)
    })

    test('should filter on engine count and manufacture year', () => {
      expect(marks(filter({ engineCount: { min: 2, max: 2 } }))).toEqual(['C-FBBB'])
      expect(marks(filter({ yearOfManufacture: { min: 2006, max: 2012 } }))).toEqual(['C-FBBB', 'C-FEEE', 'C-FEEE'])
    })
  })

  describe('search', () => {
    test('should match common or model name case-insensitively', () => {
      expect(marks(filter({ search: 'BOE' }))).toEqual(['C-FBBB'])
      expect(marks(filter({ search: 'boe' }))).toEqual(['C-FBBB'])
      expect(marks(filter({ search: '206b' }))).toEqual(['C-GCCC'])
    })

    test('should match the query as written, surrounding spaces included', () => {
      expect(marks(filter({ search: ' 206' }))).toEqual(['C-GCCC'])
      expect(filter({ search: '172 ' })).toEqual([])
    })

    test('should treat a blank query as no filter', () => {
      expect(filter({ search: '   ' })).toHaveLength(5)
    })

    test('should not match records whose names are missing', () => {
      const records = [{ Mark: 'A', 'Common Name': null, 'Model Name': null }]
      const [searchPredicate] = buildPredicates(
        { ...registry.defaults, search: 'a' },
        registry.schema
      ).slice(-1)

      expect(records.filter(searchPredicate)).toEqual([])
    })

    test('should treat regular expression characters literally', () => {
      expect(filter({ search: '.*' })).toEqual([])
    })
  })

  describe('observedRange', () => {
    test('should skip missing values', () => {
      expect(observedRange(registry.records, 'Aircraft Age')).toEqual({ min: 13, max: 30 })
    })

    test('should return null when a column has no values', () => {
      expect(observedRange(registry.records, 'Absent Column')).toBeNull()
    })
  })

  describe('defaultFilterSpec', () => {
    test('should widen fractional bounds to whole numbers', () => {
      const spec = defaultFilterSpec(
        [{ 'Weight (kg)': 10.5 }, { 'Weight (kg)': 99.2 }],
        { columns: [], weightField: 'Weight (kg)', countryField: null, registrationDateField: null }
      )

      expect(spec.weight).toEqual({ min: 10, max: 100 })
      expect(spec.aircraftAge).toEqual({ min: 0, max: 0 })
      expect(spec.search).toBe('')
    })
  })

  describe('distinctValues', () => {
    test('should return sorted text values without missing', () => {
      expect(distinctValues(registry.records, 'Province (English)')).toEqual([
        'Alberta', 'British Columbia', 'Ontario', 'Quebec'
      ])
    })
  })

  describe('normalizeNullLiterals', () => {
    test('should clear literal null cells in a copy', () => {
      const table = [{ Mark: 'C-FEEE', 'Country of Manufacture': 'null', 'Common Name': 'Null Island' }]
      const normalized = normalizeNullLiterals(table)

      expect(normalized).toEqual([{ Mark: 'C-FEEE', 'Country of Manufacture': null, 'Common Name': 'Null Island' }])
      expect(table[0]['Country of Manufacture']).toBe('null')
    })

    test('should not affect filtering on the raw table', () => {
      expect(marks(filter({ countries: ['null'] }))).toEqual(['C-FEEE', 'C-FEEE'])
    })
  })
})
