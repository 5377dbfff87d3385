export const CHART_KEYS = [
  'topManufacturers',
  'topModels',
  'categoryDistribution',
  'ownershipShare',
  'ageHistogram',
  'provinceCounts',
  'registrationsPerYear',
  'ownershipTrend'
] as const

export type ChartKey = typeof CHART_KEYS[number]

export interface ChartOption {
  enabled: boolean
}

/**
 * Which summaries the presentation layer wants. This sits outside the filter
 * and aggregation core; it only decides which summaries are built.
 */
export type ChartVisibility = Record<ChartKey, ChartOption>

export const TOP_N_LIMIT = 10
export const AGE_HISTOGRAM_BINS = 30

export const defaultChartVisibility = (): ChartVisibility => ({
  topManufacturers: { enabled: true },
  topModels: { enabled: true },
  categoryDistribution: { enabled: true },
  ownershipShare: { enabled: true },
  ageHistogram: { enabled: true },
  provinceCounts: { enabled: true },
  registrationsPerYear: { enabled: true },
  ownershipTrend: { enabled: true }
})

export const isChartKey = (value: string): value is ChartKey =>
  CHART_KEYS.some(key => key === value)
