import dotenv from 'dotenv'

dotenv.config()

export type TableSource =
  | { kind: 'sheet'; path: string; sheet: string }
  | { kind: 'delimited'; path: string; delimiter?: string }

export interface RegistrySourceConfig {
  owners: TableSource
  current: TableSource
}

export interface ServerConfig {
  port: number
  sources: RegistrySourceConfig
}

const DEFAULT_WORKBOOK = 'data/Canadian Aircraft Registry.xlsx'
const DEFAULT_OWNER_SHEET = 'carsownr'
const DEFAULT_CURRENT_SHEET = 'carscurr'
const DEFAULT_PORT = 5001

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

/**
 * Two delimited files take precedence over the workbook when both are set.
 */
export const resolveSourceConfig = (env: NodeJS.ProcessEnv = process.env): RegistrySourceConfig => {
  const ownersFile = nonEmpty(env.REGISTRY_OWNERS_FILE)
  const currentFile = nonEmpty(env.REGISTRY_CURRENT_FILE)

  if (ownersFile && currentFile) {
    const delimiter = env.REGISTRY_DELIMITER || undefined
    return {
      owners: { kind: 'delimited', path: ownersFile, delimiter },
      current: { kind: 'delimited', path: currentFile, delimiter }
    }
  }

  const workbook = nonEmpty(env.REGISTRY_WORKBOOK) ?? DEFAULT_WORKBOOK
  return {
    owners: { kind: 'sheet', path: workbook, sheet: nonEmpty(env.REGISTRY_OWNER_SHEET) ?? DEFAULT_OWNER_SHEET },
    current: { kind: 'sheet', path: workbook, sheet: nonEmpty(env.REGISTRY_CURRENT_SHEET) ?? DEFAULT_CURRENT_SHEET }
  }
}

export const resolveServerConfig = (env: NodeJS.ProcessEnv = process.env): ServerConfig => {
  const port = Number(env.PORT)
  return {
    port: Number.isInteger(port) && port > 0 ? port : DEFAULT_PORT,
    sources: resolveSourceConfig(env)
  }
}

export const describeSource = (source: TableSource): string =>
  source.kind === 'sheet' ? `${source.path} [${source.sheet}]` : source.path
