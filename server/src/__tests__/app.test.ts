import { describe, test, expect, beforeEach, vi } from 'vitest'
import request from 'supertest'

const { isInitializedMock, getMock } = vi.hoisted(() => ({
  isInitializedMock: vi.fn(),
  getMock: vi.fn()
}))

vi.mock('../services/registryStore.js', () => ({
  default: {
    isInitialized: isInitializedMock,
    get: getMock
  }
}))

import { createApp } from '../app.js'
import { HttpError } from '../utils/errors.js'

describe('App', () => {
  beforeEach(() => {
    isInitializedMock.mockReset()
    getMock.mockReset()
  })

  test('GET /health reports whether the registry is loaded', async () => {
    isInitializedMock.mockReturnValue(true)

    const response = await request(createApp()).get('/health')

    expect(response.status).toBe(200)
    expect(response.body).toEqual({ status: 'ok', registryLoaded: true })
  })

  test('mounts the registry routes under /api/registry', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
    getMock.mockImplementation(() => {
      throw new HttpError('Registry has not been loaded', 503)
    })

    const response = await request(createApp()).get('/api/registry/schema')

    expect(response.status).toBe(503)
    expect(response.body.error).toBe('Failed to get registry schema')
  })

  test('answers malformed JSON bodies with a JSON error', async () => {
    const response = await request(createApp())
      .post('/api/registry/dashboard')
      .set('Content-Type', 'application/json')
      .send('{bad')

    expect(response.status).toBe(400)
    expect(response.headers['content-type']).toBe('application/json; charset=utf-8')
    expect(response.body.error).toBe('Invalid request body')
    expect(typeof response.body.message).toBe('string')
    expect(getMock).not.toHaveBeenCalled()
  })
})
