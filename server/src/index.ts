import { resolveServerConfig } from './config/registry.js'
import { createApp } from './app.js'
import registryStore from './services/registryStore.js'
import { RegistryLoadError } from './utils/errors.js'

const main = async () => {
  const config = resolveServerConfig()

  try {
    await registryStore.initialize(config.sources)
  } catch (error) {
    if (error instanceof RegistryLoadError) {
      console.error(`Failed to load aircraft registry (${error.message})`, error.cause ?? '')
    } else {
      console.error('Failed to load aircraft registry:', error)
    }
    process.exit(1)
  }

  const app = createApp()
  app.listen(config.port, () => {
    console.log(`Registry server listening on port ${config.port}`)
  })
}

main().catch(error => {
  console.error('Server startup failed:', error)
  process.exit(1)
})
