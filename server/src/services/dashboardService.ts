import { AGE_HISTOGRAM_BINS, CHART_KEYS, ChartKey, ChartVisibility, TOP_N_LIMIT } from '../config/charts.js'
import { REGISTRY_COLUMNS } from '../config/registryColumns.js'
import { FilterSpec, LoadedRegistry, RegistryTable } from '../types/registry.js'
import aggregationService, {
  CategoryCount,
  Distribution,
  GroupCount,
  HistogramBin,
  PairCountResult
} from './aggregationService.js'
import { applyFilters, normalizeNullLiterals } from './filterEngine.js'

interface ChartBase {
  key: ChartKey
  title: string
  xAxisTitle?: string
  yAxisTitle?: string
}

export type ChartSummary =
  | (ChartBase & { kind: 'bar'; data: CategoryCount[] })
  | (ChartBase & { kind: 'pie'; data: Distribution })
  | (ChartBase & { kind: 'histogram'; data: HistogramBin[] })
  | (ChartBase & { kind: 'line'; data: GroupCount[] })
  | (ChartBase & { kind: 'multiLine'; data: PairCountResult })

export interface DashboardSummary {
  total: number
  charts: ChartSummary[]
}

type ChartBuilder = (table: RegistryTable) => ChartSummary

const CHART_BUILDERS: Record<ChartKey, ChartBuilder> = {
  topManufacturers: table => ({
    key: 'topManufacturers',
    kind: 'bar',
    title: 'Top 10 Manufacturers',
    xAxisTitle: 'Manufacturer',
    yAxisTitle: 'Count',
    data: aggregationService.topCategories(table, REGISTRY_COLUMNS.manufacturer, TOP_N_LIMIT)
  }),
  topModels: table => ({
    key: 'topModels',
    kind: 'bar',
    title: 'Top 10 Models',
    xAxisTitle: 'Model',
    yAxisTitle: 'Count',
    data: aggregationService.topCategories(table, REGISTRY_COLUMNS.modelName, TOP_N_LIMIT)
  }),
  categoryDistribution: table => ({
    key: 'categoryDistribution',
    kind: 'pie',
    title: 'Aircraft Category Share',
    data: aggregationService.distribution(table, REGISTRY_COLUMNS.category)
  }),
  ownershipShare: table => ({
    key: 'ownershipShare',
    kind: 'pie',
    title: 'Entity vs Individual',
    data: aggregationService.distribution(table, REGISTRY_COLUMNS.ownerType)
  }),
  ageHistogram: table => ({
    key: 'ageHistogram',
    kind: 'histogram',
    title: 'Aircraft Age Histogram',
    xAxisTitle: 'Aircraft Age',
    yAxisTitle: 'Count',
    data: aggregationService.histogram(table, REGISTRY_COLUMNS.aircraftAge, AGE_HISTOGRAM_BINS)
  }),
  provinceCounts: table => ({
    key: 'provinceCounts',
    kind: 'bar',
    title: 'Aircraft Count by Province',
    xAxisTitle: 'Province',
    yAxisTitle: 'Count',
    data: aggregationService.topCategories(table, REGISTRY_COLUMNS.province)
  }),
  registrationsPerYear: table => ({
    key: 'registrationsPerYear',
    kind: 'line',
    title: 'New Registrations by Year',
    xAxisTitle: 'Year',
    yAxisTitle: 'Count',
    data: aggregationService.countByValue(table, REGISTRY_COLUMNS.registrationYear)
  }),
  ownershipTrend: table => ({
    key: 'ownershipTrend',
    kind: 'multiLine',
    title: 'Entity vs Individual Over Time',
    xAxisTitle: 'Year',
    yAxisTitle: 'Count',
    data: aggregationService.countByPair(table, REGISTRY_COLUMNS.registrationYear, REGISTRY_COLUMNS.ownerType)
  })
}

export const isEmptySummary = (chart: ChartSummary): boolean => {
  switch (chart.kind) {
    case 'pie':
      return chart.data.total === 0 || chart.data.categories.length === 0
    case 'multiLine':
      return chart.data.pairs.length === 0
    default:
      return chart.data.length === 0
  }
}

/**
 * Filtered records with literal "null" cells cleared, the table every
 * consumer downstream of the filter reads.
 */
export function filteredView(registry: LoadedRegistry, spec: FilterSpec): RegistryTable {
  return normalizeNullLiterals(applyFilters(registry.records, spec, registry.schema))
}

/**
 * Builds the enabled charts for a filter spec. Charts without data are left
 * out.
 */
export function buildDashboard(
  registry: LoadedRegistry,
  spec: FilterSpec,
  charts: ChartVisibility
): DashboardSummary {
  const table = filteredView(registry, spec)
  const summaries = CHART_KEYS
    .filter(key => charts[key].enabled)
    .map(key => CHART_BUILDERS[key](table))
    .filter(chart => !isEmptySummary(chart))

  return {
    total: table.length,
    charts: summaries
  }
}
