import { readFile } from 'fs/promises'
import { join, resolve } from 'path'
import { parse as parseYaml } from 'yaml'
import { summaryConfigSchema, formatZodError } from './schemas.js'
import type { ReportName, SummaryConfig } from './schemas.js'
import { ConfigError, logger } from '../utils/index.js'

export const CONFIG_FILE_NAMES = ['tfplan-summary.yml', 'tfplan-summary.yaml']
const DEFAULT_ENCODING = 'utf-8'

export interface CliOptions {
  path: string
  color?: boolean
  statistics?: boolean
  resources?: boolean
  format?: string
  config?: string
}

export interface SummaryOptions {
  path: string
  color: boolean
  format: string
  showStatistics: boolean
  showResources: boolean
}

/**
 * Reads the config file given with `--config`, or the first default config file
 * found in `cwd`. Returns an empty config when there is none.
 */
export async function readConfig(cwd: string, explicitPath?: string): Promise<SummaryConfig> {
  if (explicitPath) {
    const configPath = resolve(cwd, explicitPath)
    const content = await readConfigFile(configPath)
    if (content === null) {
      throw new ConfigError('Config file not found', configPath)
    }
    return parseConfig(content, configPath)
  }

  for (const candidate of CONFIG_FILE_NAMES) {
    const configPath = join(cwd, candidate)
    const content = await readConfigFile(configPath)
    if (content !== null) {
      return parseConfig(content, configPath)
    }
  }
  return {}
}

export function parseConfig(content: string, configPath: string): SummaryConfig {
  let raw: unknown
  try {
    raw = parseYaml(content)
  } catch (error) {
    throw new ConfigError(`Invalid YAML: ${error instanceof Error ? error.message : String(error)}`, configPath)
  }

  const result = summaryConfigSchema.safeParse(raw ?? {})
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error), configPath)
  }

  logger.debug(`Loaded config from ${configPath}`)
  return result.data
}

/**
 * Command line flags win over the config file, which wins over the defaults.
 * With no report selected anywhere, both are shown.
 */
export function resolveOptions(cli: CliOptions, config: SummaryConfig): SummaryOptions {
  const flagged: ReportName[] = []
  if (cli.statistics) flagged.push('statistics')
  if (cli.resources) flagged.push('resources')

  const selected = flagged.length > 0 ? flagged : (config.reports ?? [])
  const showAll = selected.length === 0

  return {
    path: cli.path,
    color: cli.color ?? config.color ?? false,
    format: cli.format ?? config.format ?? 'table',
    showStatistics: showAll || selected.includes('statistics'),
    showResources: showAll || selected.includes('resources'),
  }
}

async function readConfigFile(configPath: string): Promise<string | null> {
  try {
    return await readFile(configPath, DEFAULT_ENCODING)
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null
    }
    throw new ConfigError(`Error reading config file: ${error instanceof Error ? error.message : String(error)}`, configPath)
  }
}
