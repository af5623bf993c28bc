import { readFile } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { parse as parseDotenv } from 'dotenv'
import { ClientConfig, DEFAULT_BASE_URL, DEFAULT_POLL_INTERVAL, DEFAULT_RATE_LIMIT_RETRIES } from '../types'
import { deepMerge } from '../utils/deep-merge'
import { errorMessage } from '../errors'
import validateConfig from './validate'
import { ConfigLoadError } from './errors'

export const CONFIG_FILENAME = 'gtmetrix.config.json'

export interface LoadConfigOptions {
  cwd?: string
  /** Explicit config file; when set, a missing file is an error */
  configPath?: string
  envPrefix?: string
  /** `.env` file read with dotenv; real environment variables win over it */
  envFile?: string
  env?: NodeJS.ProcessEnv
  overrides?: Partial<ClientConfig>
}

type EnvParser = 'string' | 'integer'

function createDefaultConfig(): Partial<ClientConfig> {
  return {
    baseUrl: DEFAULT_BASE_URL,
    pollInterval: DEFAULT_POLL_INTERVAL,
    rateLimitRetries: DEFAULT_RATE_LIMIT_RETRIES,
  }
}

/**
 * Loads client configuration with the following precedence, lowest first:
 * 1. Defaults
 * 2. gtmetrix.config.json (or `configPath`)
 * 3. Environment variables (`GTMETRIX_API_KEY`, `GTMETRIX_BASE_URL`, ...)
 * 4. Explicit overrides
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ClientConfig> {
  const { cwd = process.cwd(), configPath, envPrefix = 'GTMETRIX_', envFile, overrides = {} } = options

  let config: Record<string, unknown> = createDefaultConfig()

  const fileConfig = await loadConfigFile(cwd, configPath)
  if (fileConfig) {
    config = deepMerge(config, fileConfig)
  }

  const env = await resolveEnv(cwd, options.env ?? process.env, envFile)
  config = deepMerge(config, loadConfigFromEnv(env, envPrefix))

  config = deepMerge(config, overrides)

  return validateConfig(config)
}

async function loadConfigFile(cwd: string, configPath?: string): Promise<Record<string, unknown> | null> {
  const targetPath = resolve(cwd, configPath ?? CONFIG_FILENAME)

  let content: string
  try {
    content = await readFile(targetPath, 'utf-8')
  } catch (error) {
    // Only the implicit file is optional
    if (!configPath && isFileMissing(error)) {
      return null
    }
    throw new ConfigLoadError(`Failed to read config file ${targetPath}: ${errorMessage(error)}`, error)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (error) {
    throw new ConfigLoadError(`Failed to parse config file ${targetPath}: ${errorMessage(error)}`, error)
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigLoadError(`Config file ${targetPath} must contain a JSON object`)
  }

  return { ...parsed }
}

async function resolveEnv(cwd: string, env: NodeJS.ProcessEnv, envFile?: string): Promise<NodeJS.ProcessEnv> {
  if (!envFile) {
    return env
  }

  const envPath = join(cwd, envFile)
  try {
    const fromFile = parseDotenv(await readFile(envPath))
    return { ...fromFile, ...env }
  } catch (error) {
    throw new ConfigLoadError(`Failed to read env file ${envPath}: ${errorMessage(error)}`, error)
  }
}

function loadConfigFromEnv(env: NodeJS.ProcessEnv, prefix: string): Record<string, unknown> {
  const config: Record<string, unknown> = {}

  const envMappings: Record<string, [keyof ClientConfig, EnvParser]> = {
    [`${prefix}API_KEY`]: ['apiKey', 'string'],
    [`${prefix}BASE_URL`]: ['baseUrl', 'string'],
    [`${prefix}POLL_INTERVAL`]: ['pollInterval', 'integer'],
    [`${prefix}RATE_LIMIT_RETRIES`]: ['rateLimitRetries', 'integer'],
    [`${prefix}TIMEOUT`]: ['timeout', 'integer'],
  }

  for (const [envVar, [key, parser]] of Object.entries(envMappings)) {
    const value = env[envVar]
    if (value === undefined || value === '') continue
    config[key] = parseEnvValue(value, parser)
  }

  return config
}

/**
 * Integers that do not parse are passed through as strings so that
 * validation reports them against the right key
 */
function parseEnvValue(value: string, parser: EnvParser): unknown {
  if (parser === 'integer' && /^\d+$/.test(value.trim())) {
    return parseInt(value, 10)
  }
  return value
}

function isFileMissing(error: unknown): boolean {
  // fs errors may come from another realm, so no instanceof check
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
}
