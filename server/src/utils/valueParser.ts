import { CellValue } from '../types/registry.js'

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/
const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/
const ISO_YEAR_MONTH = /^(\d{4})(?:-(\d{2}))?$/

const pad = (value: number) => String(value).padStart(2, '0')

/**
 * Normalize a raw source cell. Strings are trimmed, blank text becomes missing,
 * dates become `YYYY-MM-DD` in the zone they were read in.
 */
export function normalizeCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null

  if (typeof value === 'string') {
    const trimmed = value.trim()
    return trimmed === '' ? null : trimmed
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null
  }

  if (value instanceof Date) {
    if (isNaN(value.getTime())) return null
    return `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`
  }

  if (typeof value === 'boolean') {
    return String(value)
  }

  return null
}

export function isMissing(value: CellValue | undefined): value is null | undefined {
  return value === null || value === undefined
}

/**
 * Coerce a cell to a number. Anything that does not read as a plain decimal
 * number is missing.
 */
export function toNumeric(value: CellValue | undefined): number | null {
  if (isMissing(value)) return null

  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null
  }

  const trimmed = value.trim()
  if (!NUMERIC_PATTERN.test(trimmed)) return null

  const parsed = Number(trimmed)
  return Number.isFinite(parsed) ? parsed : null
}

/**
 * Extract the calendar year from a date cell. Numbers are not treated as
 * dates.
 */
export function parseCalendarYear(value: CellValue | undefined): number | null {
  if (isMissing(value) || typeof value === 'number') return null

  const trimmed = value.trim()
  const isoMatch = ISO_DATE_PREFIX.exec(trimmed)
  if (isoMatch) {
    const month = Number(isoMatch[2])
    const day = Number(isoMatch[3])
    if (month < 1 || month > 12 || day < 1 || day > 31) return null
    return Number(isoMatch[1])
  }

  // Year-only and year-month text would parse as UTC midnight
  const partialMatch = ISO_YEAR_MONTH.exec(trimmed)
  if (partialMatch) {
    const month = partialMatch[2] === undefined ? 1 : Number(partialMatch[2])
    return month < 1 || month > 12 ? null : Number(partialMatch[1])
  }

  const parsed = new Date(trimmed)
  if (isNaN(parsed.getTime())) return null
  return parsed.getFullYear()
}

/**
 * Text form used for set membership and search. Missing stays missing.
 */
export function cellText(value: CellValue | undefined): string | null {
  if (isMissing(value)) return null
  return typeof value === 'number' ? String(value) : value
}

/**
 * Natural ascending order for group keys: numbers first, then text.
 */
export function compareCells(a: string | number, b: string | number): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b
  if (typeof a === 'number') return -1
  if (typeof b === 'number') return 1
  return a < b ? -1 : a > b ? 1 : 0
}
