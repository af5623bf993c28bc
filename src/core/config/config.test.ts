import { describe, it, expect, beforeEach, afterEach } from '@jest/globals'
import { mkdtemp, writeFile, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { loadConfig, validateConfig } from '.'
import { ConfigLoadError, ConfigValidationError } from './errors'

describe('Config loader', () => {
  let testDir: string

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'gtmetrix-config-'))
  })

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true })
  })

  describe('loadConfig', () => {
    it('should apply defaults around an API key from the environment', async () => {
      const config = await loadConfig({ cwd: testDir, env: { GTMETRIX_API_KEY: 'test-key' } })

      expect(config).toEqual({
        apiKey: 'test-key',
        baseUrl: 'https://gtmetrix.com/api/2.0/',
        pollInterval: 3000,
        rateLimitRetries: 10,
      })
    })

    it('should fail validation when no API key is configured anywhere', async () => {
      const error = await loadConfig({ cwd: testDir, env: {} }).catch((e: unknown) => e)

      expect(error).toBeInstanceOf(ConfigValidationError)
      if (error instanceof ConfigValidationError) {
        expect(error.getErrorSummary()).toBe('apiKey: Required')
      }
    })

    it('should load gtmetrix.config.json from the working directory', async () => {
      await writeFile(
        join(testDir, 'gtmetrix.config.json'),
        JSON.stringify({ apiKey: 'file-key', pollInterval: 5000, timeout: 600000 }, null, 2),
      )

      const config = await loadConfig({ cwd: testDir, env: {} })

      expect(config.apiKey).toBe('file-key')
      expect(config.pollInterval).toBe(5000)
      expect(config.timeout).toBe(600000)
    })

    it('should prefer an explicit config path', async () => {
      await writeFile(join(testDir, 'gtmetrix.config.json'), JSON.stringify({ apiKey: 'default-key' }))
      await writeFile(join(testDir, 'staging.json'), JSON.stringify({ apiKey: 'staging-key' }))

      const config = await loadConfig({ cwd: testDir, configPath: 'staging.json', env: {} })

      expect(config.apiKey).toBe('staging-key')
    })

    it('should throw ConfigLoadError for a missing explicit config file', async () => {
      await expect(loadConfig({ cwd: testDir, configPath: 'nope.json', env: {} })).rejects.toBeInstanceOf(
        ConfigLoadError,
      )
    })

    it('should throw ConfigLoadError for invalid JSON', async () => {
      await writeFile(join(testDir, 'gtmetrix.config.json'), '{ invalid json }')

      await expect(loadConfig({ cwd: testDir, env: {} })).rejects.toBeInstanceOf(ConfigLoadError)
    })

    it('should throw ConfigLoadError when the file is not an object', async () => {
      await writeFile(join(testDir, 'gtmetrix.config.json'), '["test-key"]')

      await expect(loadConfig({ cwd: testDir, env: {} })).rejects.toThrow('must contain a JSON object')
    })

    it('should apply environment variable overrides on top of the file', async () => {
      await writeFile(join(testDir, 'gtmetrix.config.json'), JSON.stringify({ apiKey: 'file-key', pollInterval: 5000 }))

      const config = await loadConfig({
        cwd: testDir,
        env: {
          GTMETRIX_API_KEY: 'env-key',
          GTMETRIX_POLL_INTERVAL: '2000',
          GTMETRIX_RATE_LIMIT_RETRIES: '0',
          GTMETRIX_BASE_URL: 'https://api.test/2.0/',
        },
      })

      expect(config).toMatchObject({
        apiKey: 'env-key',
        pollInterval: 2000,
        rateLimitRetries: 0,
        baseUrl: 'https://api.test/2.0/',
      })
    })

    it('should keep a numeric API key as a string', async () => {
      const config = await loadConfig({ cwd: testDir, env: { GTMETRIX_API_KEY: '12345' } })

      expect(config.apiKey).toBe('12345')
    })

    it('should report a non-numeric interval against its key', async () => {
      const error = await loadConfig({
        cwd: testDir,
        env: { GTMETRIX_API_KEY: 'test-key', GTMETRIX_POLL_INTERVAL: 'soon' },
      }).catch((e: unknown) => e)

      expect(error).toBeInstanceOf(ConfigValidationError)
      if (error instanceof ConfigValidationError) {
        expect(error.validationErrors[0]?.path).toEqual(['pollInterval'])
      }
    })

    it('should honour a custom environment prefix', async () => {
      const config = await loadConfig({ cwd: testDir, envPrefix: 'PERF_GT_', env: { PERF_GT_API_KEY: 'test-key' } })

      expect(config.apiKey).toBe('test-key')
    })

    it('should read a .env file without letting it beat real variables', async () => {
      await writeFile(join(testDir, '.env'), 'GTMETRIX_API_KEY=dotenv-key\nGTMETRIX_TIMEOUT=90000\n')

      const fromFile = await loadConfig({ cwd: testDir, envFile: '.env', env: {} })
      const overridden = await loadConfig({ cwd: testDir, envFile: '.env', env: { GTMETRIX_API_KEY: 'real-key' } })

      expect(fromFile.apiKey).toBe('dotenv-key')
      expect(fromFile.timeout).toBe(90000)
      expect(overridden.apiKey).toBe('real-key')
    })

    it('should throw ConfigLoadError for a missing .env file', async () => {
      await expect(loadConfig({ cwd: testDir, envFile: '.env.missing', env: {} })).rejects.toBeInstanceOf(
        ConfigLoadError,
      )
    })

    it('should apply explicit overrides with highest priority and skip undefined ones', async () => {
      const config = await loadConfig({
        cwd: testDir,
        env: { GTMETRIX_API_KEY: 'env-key', GTMETRIX_POLL_INTERVAL: '2000' },
        overrides: { apiKey: 'override-key', pollInterval: undefined },
      })

      expect(config.apiKey).toBe('override-key')
      expect(config.pollInterval).toBe(2000)
    })
  })

  describe('validateConfig', () => {
    it('should reject an invalid base URL', () => {
      expect(() => validateConfig({ apiKey: 'test-key', baseUrl: 'not a url' })).toThrow(ConfigValidationError)
    })

    it('should reject a negative retry count', () => {
      let caught: unknown
      try {
        validateConfig({ apiKey: 'test-key', rateLimitRetries: -1 })
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(ConfigValidationError)
      expect(caught).toMatchObject({ validationErrors: [{ path: ['rateLimitRetries'] }] })
    })
  })
})
