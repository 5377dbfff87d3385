import { CellValue, RegistryRecord, RegistryTable } from '../types/registry.js'
import { compareCells } from '../utils/valueParser.js'

export type GroupValue = string | number

export interface CategoryCount {
  value: GroupValue
  count: number
  percentage: number
}

export interface Distribution {
  total: number
  categories: CategoryCount[]
}

export interface HistogramBin {
  bin_start: number
  bin_end: number
  count: number
}

export interface GroupCount {
  value: GroupValue
  count: number
}

export interface PairCount {
  x: GroupValue
  series: GroupValue
  count: number
}

export interface Series {
  name: GroupValue
  points: GroupCount[]
}

export interface PairCountResult {
  pairs: PairCount[]
  series: Series[]
}

const groupValue = (record: Readonly<RegistryRecord>, field: string): GroupValue | null => {
  const value: CellValue | undefined = record[field]
  return value === null || value === undefined ? null : value
}

// Map keys keep numbers and strings apart, so 2001 and "2001" are distinct groups.
const countInEncounterOrder = (table: RegistryTable, field: string): Map<GroupValue, number> => {
  const counts = new Map<GroupValue, number>()
  for (const record of table) {
    const value = groupValue(record, field)
    if (value === null) continue
    counts.set(value, (counts.get(value) ?? 0) + 1)
  }
  return counts
}

class AggregationService {
  private toCategoryCounts(counts: Map<GroupValue, number>, totalRows: number): CategoryCount[] {
    // Array.prototype.sort is stable, so ties keep first-encounter order.
    return [...counts.entries()]
      .sort((a, b) => b[1] - a[1])
      .map(([value, count]) => ({
        value,
        count,
        percentage: totalRows > 0 ? (count / totalRows) * 100 : 0
      }))
  }

  /**
   * Most frequent values of a field, count descending. Without a limit every
   * value is returned.
   */
  topCategories(table: RegistryTable, field: string, limit?: number): CategoryCount[] {
    const ranked = this.toCategoryCounts(countInEncounterOrder(table, field), table.length)
    return limit === undefined ? ranked : ranked.slice(0, Math.max(limit, 0))
  }

  /**
   * Every value of a field with its count, plus the table's row count for the
   * donut centre.
   */
  distribution(table: RegistryTable, field: string): Distribution {
    return {
      total: table.length,
      categories: this.topCategories(table, field)
    }
  }

  /**
   * Equal-width bins over the observed range of a numeric field. Bins are
   * half-open except the last, which includes the maximum.
   */
  histogram(table: RegistryTable, field: string, binCount: number): HistogramBin[] {
    const values: number[] = []
    for (const record of table) {
      const value = record[field]
      if (typeof value === 'number') values.push(value)
    }

    if (values.length === 0 || binCount < 1) return []

    let min = values[0]
    let max = values[0]
    for (const value of values) {
      if (value < min) min = value
      if (value > max) max = value
    }

    if (min === max) {
      return [{ bin_start: min, bin_end: max, count: values.length }]
    }

    const binWidth = (max - min) / binCount
    const bins: HistogramBin[] = Array.from({ length: binCount }, (_, index) => ({
      bin_start: min + index * binWidth,
      bin_end: index === binCount - 1 ? max : min + (index + 1) * binWidth,
      count: 0
    }))

    for (const value of values) {
      const index = Math.min(Math.floor((value - min) / binWidth), binCount - 1)
      bins[index].count += 1
    }

    return bins
  }

  /**
   * Counts per value in ascending value order. Missing values are dropped.
   */
  countByValue(table: RegistryTable, field: string): GroupCount[] {
    return [...countInEncounterOrder(table, field).entries()]
      .sort((a, b) => compareCells(a[0], b[0]))
      .map(([value, count]) => ({ value, count }))
  }

  /**
   * Counts per (x, series) pair ordered by x then series, and the same counts
   * split into one series per distinct series value. Rows missing either
   * field are dropped.
   */
  countByPair(table: RegistryTable, xField: string, seriesField: string): PairCountResult {
    const bySeries = new Map<GroupValue, Map<GroupValue, number>>()

    for (const record of table) {
      const x = groupValue(record, xField)
      const series = groupValue(record, seriesField)
      if (x === null || series === null) continue

      let counts = bySeries.get(series)
      if (!counts) {
        counts = new Map<GroupValue, number>()
        bySeries.set(series, counts)
      }
      counts.set(x, (counts.get(x) ?? 0) + 1)
    }

    const series: Series[] = [...bySeries.entries()]
      .sort((a, b) => compareCells(a[0], b[0]))
      .map(([name, counts]) => ({
        name,
        points: [...counts.entries()]
          .sort((a, b) => compareCells(a[0], b[0]))
          .map(([value, count]) => ({ value, count }))
      }))

    const pairs: PairCount[] = series
      .flatMap(({ name, points }) => points.map(point => ({ x: point.value, series: name, count: point.count })))
      .sort((a, b) => compareCells(a.x, b.x) || compareCells(a.series, b.series))

    return { pairs, series }
  }
}

export default new AggregationService()
