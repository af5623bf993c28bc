import { loadConfig } from './core/config'
import type { ClientConfig, TestState } from './core/types'
import { Account, Report, Test } from './client'
import type { TestOptions, TransportOptions } from './client'

export interface RunTestOptions extends Pick<TransportOptions, 'fetch' | 'sleep' | 'now'> {
  /** Falls back to GTMETRIX_API_KEY or gtmetrix.config.json */
  apiKey?: string
  baseUrl?: string
  pollInterval?: number
  rateLimitRetries?: number
  /** Maximum time to wait for the test, in ms */
  timeout?: number
  signal?: AbortSignal

  /** Test parameters such as `location`, `browser` or `adblock` */
  testOptions?: TestOptions

  /** Where to look for gtmetrix.config.json */
  cwd?: string
  configPath?: string

  /** Progress callbacks */
  onStart?: (test: Test) => void
  onStateChange?: (state: TestState, test: Test) => void
}

export interface RunTestResult {
  test: Test
  state: TestState
  /** Undefined when the test ended in `error` */
  report: Report | undefined
}

/**
 * Examples:
 * ```ts
 * // Start a test and wait for its report
 * const { report } = await runTest('https://example.com')
 * console.log(report?.attributes.gtmetrix_grade)
 *
 * // Pick a location and bound the wait
 * const { state } = await runTest('https://example.com', {
 *   testOptions: { location: '2', browser: '3' },
 *   timeout: 5 * 60_000,
 *   onStateChange: (state) => console.log('state:', state),
 * })
 * ```
 */
export async function runTest(url: string, options: RunTestOptions = {}): Promise<RunTestResult> {
  const config = await loadConfig({
    cwd: options.cwd,
    configPath: options.configPath,
    overrides: {
      apiKey: options.apiKey,
      baseUrl: options.baseUrl,
      pollInterval: options.pollInterval,
      rateLimitRetries: options.rateLimitRetries,
      timeout: options.timeout,
    },
  })

  const account = createAccount(config, options)
  const test = await account.startTest(url, options.testOptions)
  options.onStart?.(test)

  const state = await test.fetch({
    waitForCompletion: true,
    timeout: config.timeout,
    signal: options.signal,
    onStateChange: options.onStateChange,
  })

  return { test, state, report: await test.getReport() }
}

export function createAccount(
  config: ClientConfig,
  transport: Pick<TransportOptions, 'fetch' | 'sleep' | 'now'> = {},
): Account {
  return Account.fromConfig(config, transport)
}
