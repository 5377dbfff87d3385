import { CHART_KEYS, ChartVisibility, defaultChartVisibility, isChartKey } from '../config/charts.js'
import { FilterSpec, NumericRange } from '../types/registry.js'
import { badRequest } from './errors.js'

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const parseSelection = (value: unknown, field: string, fallback: readonly string[]): readonly string[] => {
  if (value === undefined || value === null) return fallback
  if (!Array.isArray(value)) {
    throw badRequest(`filters.${field} must be an array of strings`)
  }
  return value.map(item => {
    if (typeof item === 'string') return item
    if (typeof item === 'number' && Number.isFinite(item)) return String(item)
    throw badRequest(`filters.${field} must be an array of strings`)
  })
}

const parseBound = (value: unknown, field: string, fallback: number): number => {
  if (value === undefined || value === null) return fallback
  if (typeof value === 'string' && value.trim() === '') return fallback
  const parsed = typeof value === 'string' ? Number(value) : value
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    throw badRequest(`${field} must be a number`)
  }
  return parsed
}

const parseRange = (value: unknown, field: string, fallback: NumericRange): NumericRange => {
  if (value === undefined || value === null) return fallback

  let raw: { min: unknown; max: unknown }
  if (Array.isArray(value) && value.length === 2) {
    raw = { min: value[0], max: value[1] }
  } else if (isPlainObject(value)) {
    raw = { min: value.min, max: value.max }
  } else {
    throw badRequest(`filters.${field} must be { min, max } or [min, max]`)
  }

  const range = {
    min: parseBound(raw.min, `filters.${field}.min`, fallback.min),
    max: parseBound(raw.max, `filters.${field}.max`, fallback.max)
  }
  if (range.min > range.max) {
    throw badRequest(`filters.${field}.min must not exceed max`)
  }
  return range
}

/**
 * Reads a filter spec from a request body. Omitted fields keep the registry
 * defaults, so `{}` selects everything with a known engine count, year and
 * age.
 */
export function parseFilterSpec(value: unknown, defaults: FilterSpec): FilterSpec {
  if (value === undefined || value === null) return defaults
  if (!isPlainObject(value)) {
    throw badRequest('filters must be an object')
  }

  if (value.search !== undefined && value.search !== null && typeof value.search !== 'string') {
    throw badRequest('filters.search must be a string')
  }

  // Weight stays disabled when the registry has no weight column.
  const weight = defaults.weight
    ? parseRange(value.weight, 'weight', defaults.weight)
    : null

  return Object.freeze({
    provinces: parseSelection(value.provinces, 'provinces', defaults.provinces),
    categories: parseSelection(value.categories, 'categories', defaults.categories),
    ownerTypes: parseSelection(value.ownerTypes, 'ownerTypes', defaults.ownerTypes),
    engineCategories: parseSelection(value.engineCategories, 'engineCategories', defaults.engineCategories),
    countries: parseSelection(value.countries, 'countries', defaults.countries),
    engineCount: parseRange(value.engineCount, 'engineCount', defaults.engineCount),
    yearOfManufacture: parseRange(value.yearOfManufacture, 'yearOfManufacture', defaults.yearOfManufacture),
    aircraftAge: parseRange(value.aircraftAge, 'aircraftAge', defaults.aircraftAge),
    weight,
    search: typeof value.search === 'string' ? value.search : defaults.search
  })
}

/**
 * Chart toggles accept `{ key: { enabled } }` or `{ key: boolean }`. Unknown
 * keys are rejected; omitted keys stay enabled.
 */
export function parseChartVisibility(value: unknown): ChartVisibility {
  const visibility = defaultChartVisibility()
  if (value === undefined || value === null) return visibility
  if (!isPlainObject(value)) {
    throw badRequest('charts must be an object')
  }

  for (const [key, option] of Object.entries(value)) {
    if (!isChartKey(key)) {
      throw badRequest(`Unknown chart '${key}' (expected one of ${CHART_KEYS.join(', ')})`)
    }
    if (typeof option === 'boolean') {
      visibility[key] = { enabled: option }
    } else if (isPlainObject(option) && typeof option.enabled === 'boolean') {
      visibility[key] = { enabled: option.enabled }
    } else {
      throw badRequest(`charts.${key} must be a boolean or { enabled: boolean }`)
    }
  }

  return visibility
}

export interface Paging {
  offset: number
  limit: number
}

export const DEFAULT_PAGE_SIZE = 100
export const MAX_PAGE_SIZE = 1000

const parseCount = (value: unknown, field: string, fallback: number): number => {
  if (value === undefined || value === null) return fallback
  if (typeof value === 'string' && value.trim() === '') return fallback
  const parsed = typeof value === 'string' ? Number(value) : value
  if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed < 0) {
    throw badRequest(`${field} must be a non-negative integer`)
  }
  return parsed
}

export function parsePaging(offset: unknown, limit: unknown): Paging {
  return {
    offset: parseCount(offset, 'offset', 0),
    limit: Math.min(parseCount(limit, 'limit', DEFAULT_PAGE_SIZE), MAX_PAGE_SIZE)
  }
}
