const COLUMN_FALLBACK_PREFIX = 'column_'

/**
 * Header names are kept as written in the source so that the registry's
 * column names (e.g. "Province (English)") stay addressable. Blank headers get
 * a positional fallback and repeated headers a numeric suffix.
 */
export function uniqueColumnName(
  rawName: unknown,
  index: number,
  usedNames: Set<string>,
  baseNameCounts: Map<string, number>
): string {
  const fallback = `${COLUMN_FALLBACK_PREFIX}${index + 1}`
  const trimmed = rawName === null || rawName === undefined ? '' : String(rawName).trim()
  const base = trimmed.length > 0 ? trimmed : fallback

  if (!usedNames.has(base)) {
    usedNames.add(base)
    baseNameCounts.set(base, 1)
    return base
  }

  let counter = (baseNameCounts.get(base) ?? 1) + 1
  let candidate = `${base}_${counter}`
  while (usedNames.has(candidate)) {
    counter += 1
    candidate = `${base}_${counter}`
  }

  baseNameCounts.set(base, counter)
  usedNames.add(candidate)
  return candidate
}

export function uniqueColumnNames(rawNames: readonly unknown[]): string[] {
  const usedNames = new Set<string>()
  const baseNameCounts = new Map<string, number>()
  return rawNames.map((name, index) => uniqueColumnName(name, index, usedNames, baseNameCounts))
}
