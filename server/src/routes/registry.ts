import express from 'express'
import registryStore from '../services/registryStore.js'
import { buildDashboard, filteredView } from '../services/dashboardService.js'
import { errorMessage, errorStatus } from '../utils/errors.js'
import { parseChartVisibility, parseFilterSpec, parsePaging } from '../utils/requestParser.js'
import { tableToCsv } from '../utils/tableExport.js'

const router = express.Router()

const sendError = (res: express.Response, error: unknown, context: string) => {
  const status = errorStatus(error)
  if (status >= 500) {
    console.error(`${context} error:`, error)
  }
  return res.status(status).json({ error: context, message: errorMessage(error) })
}

// Resolved schema descriptor
router.get('/schema', (_req, res) => {
  try {
    const registry = registryStore.get()
    return res.json({
      success: true,
      schema: registry.schema,
      rowCount: registry.records.length
    })
  } catch (error) {
    return sendError(res, error, 'Failed to get registry schema')
  }
})

// Selectable values and the default filter spec
router.get('/filters', (_req, res) => {
  try {
    const registry = registryStore.get()
    return res.json({
      success: true,
      options: registry.options,
      defaults: registry.defaults
    })
  } catch (error) {
    return sendError(res, error, 'Failed to get filter options')
  }
})

// Chart summaries for a filter spec
router.post('/dashboard', (req, res) => {
  try {
    const registry = registryStore.get()
    const { filters, charts } = req.body ?? {}
    const spec = parseFilterSpec(filters, registry.defaults)
    const visibility = parseChartVisibility(charts)

    const dashboard = buildDashboard(registry, spec, visibility)
    return res.json({ success: true, ...dashboard })
  } catch (error) {
    return sendError(res, error, 'Failed to build dashboard')
  }
})

// Page of the filtered dataset
router.post('/records', (req, res) => {
  try {
    const registry = registryStore.get()
    const { filters, offset, limit } = req.body ?? {}
    const spec = parseFilterSpec(filters, registry.defaults)
    const paging = parsePaging(offset, limit)

    const table = filteredView(registry, spec)
    return res.json({
      success: true,
      columns: registry.schema.columns,
      total: table.length,
      offset: paging.offset,
      limit: paging.limit,
      records: table.slice(paging.offset, paging.offset + paging.limit)
    })
  } catch (error) {
    return sendError(res, error, 'Failed to get records')
  }
})

// Filtered dataset as CSV
router.post('/export', (req, res) => {
  try {
    const registry = registryStore.get()
    const { filters } = req.body ?? {}
    const spec = parseFilterSpec(filters, registry.defaults)

    const csv = tableToCsv(filteredView(registry, spec), registry.schema.columns)
    res.setHeader('Content-Type', 'text/csv; charset=utf-8')
    res.setHeader('Content-Disposition', 'attachment; filename="aircraft-registry.csv"')
    return res.send(csv)
  } catch (error) {
    return sendError(res, error, 'Failed to export records')
  }
})

export default router
