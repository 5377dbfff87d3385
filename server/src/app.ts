import express, { NextFunction, Request, Response } from 'express'
import registryRouter from './routes/registry.js'
import registryStore from './services/registryStore.js'
import { errorMessage } from './utils/errors.js'

// Body parser failures carry their HTTP status (400 for malformed JSON, 413 for oversized bodies)
const requestErrorStatus = (error: unknown): number => {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status
  }
  return 500
}

export const createApp = () => {
  const app = express()

  app.use(express.json({ limit: '1mb' }))

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', registryLoaded: registryStore.isInitialized() })
  })

  app.use('/api/registry', registryRouter)

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(error)
    }
    const status = requestErrorStatus(error)
    if (status >= 500) {
      console.error('Request failed:', error)
      return res.status(status).json({ error: 'Request failed', message: errorMessage(error) })
    }
    res.status(status).json({ error: 'Invalid request body', message: errorMessage(error) })
  })

  return app
}
