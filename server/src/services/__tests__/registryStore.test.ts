import { describe, test, expect, vi } from 'vitest'
import { RegistryStore } from '../registryStore.js'
import { RegistrySourceConfig } from '../../config/registry.js'
import { LoadedRegistry } from '../../types/registry.js'
import { HttpError } from '../../utils/errors.js'

const sources: RegistrySourceConfig = {
  owners: { kind: 'delimited', path: 'owners.csv' },
  current: { kind: 'delimited', path: 'current.csv' }
}

const emptyRegistry: LoadedRegistry = {
  records: [],
  schema: { columns: [], weightField: null, countryField: null, registrationDateField: null },
  defaults: {
    provinces: [],
    categories: [],
    ownerTypes: [],
    engineCategories: [],
    countries: [],
    engineCount: { min: 0, max: 0 },
    yearOfManufacture: { min: 0, max: 0 },
    aircraftAge: { min: 0, max: 0 },
    weight: null,
    search: ''
  },
  options: { provinces: [], categories: [], ownerTypes: [], engineCategories: [], countries: [] }
}

describe('RegistryStore', () => {
  test('refuses access before initialization', () => {
    const store = new RegistryStore(vi.fn())

    expect(store.isInitialized()).toBe(false)
    expect(() => store.get()).toThrow(HttpError)
    expect(() => store.get()).toThrow('Registry has not been loaded')
  })

  test('loads once and serves the same registry afterwards', async () => {
    const loader = vi.fn().mockResolvedValue(emptyRegistry)
    const store = new RegistryStore(loader)

    const first = await store.initialize(sources)
    const second = await store.initialize(sources)

    expect(loader).toHaveBeenCalledTimes(1)
    expect(loader).toHaveBeenCalledWith(sources)
    expect(first).toBe(emptyRegistry)
    expect(second).toBe(emptyRegistry)
    expect(store.get()).toBe(emptyRegistry)
  })

  test('shares one load between concurrent initializations', async () => {
    const loader = vi.fn().mockResolvedValue(emptyRegistry)
    const store = new RegistryStore(loader)

    await Promise.all([store.initialize(sources), store.initialize(sources)])

    expect(loader).toHaveBeenCalledTimes(1)
  })

  test('stays uninitialized when the load fails', async () => {
    const loader = vi.fn().mockRejectedValue(new Error('unreadable'))
    const store = new RegistryStore(loader)

    await expect(store.initialize(sources)).rejects.toThrow('unreadable')
    expect(store.isInitialized()).toBe(false)
  })
})
