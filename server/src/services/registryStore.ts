import { RegistrySourceConfig } from '../config/registry.js'
import { LoadedRegistry } from '../types/registry.js'
import { HttpError } from '../utils/errors.js'
import { loadRegistry } from './registryLoader.js'

type RegistryLoader = (sources: RegistrySourceConfig) => Promise<LoadedRegistry>

/**
 * Holds the loaded registry for the lifetime of the process. Populated once by
 * `initialize`; never reloaded or mutated afterwards.
 */
export class RegistryStore {
  private registry: LoadedRegistry | null = null
  private pending: Promise<LoadedRegistry> | null = null

  constructor(private readonly loader: RegistryLoader = loadRegistry) {}

  async initialize(sources: RegistrySourceConfig): Promise<LoadedRegistry> {
    if (this.registry) return this.registry

    if (!this.pending) {
      this.pending = this.loader(sources)
        .then(registry => {
          this.registry = registry
          return registry
        })
        .finally(() => {
          this.pending = null
        })
    }

    return this.pending
  }

  isInitialized(): boolean {
    return this.registry !== null
  }

  get(): LoadedRegistry {
    if (!this.registry) {
      throw new HttpError('Registry has not been loaded', 503)
    }
    return this.registry
  }
}

export default new RegistryStore()
