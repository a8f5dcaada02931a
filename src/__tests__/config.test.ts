import { describe, it, expect } from 'vitest'
import { ConfigError, DEFAULT_CONFIG, loadConfig, parseDuration } from '@/config'

describe('loadConfig', () => {
  it('should return defaults with an empty environment', () => {
    expect(loadConfig({}, {})).toEqual(DEFAULT_CONFIG)
    expect(DEFAULT_CONFIG).toMatchObject({
      serverAddress: 'http://127.0.0.1:8188',
      targetNodeId: '32',
      targetInput: 'text',
      pollInterval: 1000,
      cooldown: 2000,
      stopOnError: true
    })
    expect(DEFAULT_CONFIG.waitTimeout).toBeUndefined()
  })

  it('should read overrides from the environment', () => {
    const config = loadConfig(
      {},
      {
        COMFY_SERVER_URL: 'http://gpu-box:8188',
        COMFY_POLL_INTERVAL: '250',
        COMFY_WAIT_TIMEOUT: '60000',
        COMFY_CONTINUE_ON_ERROR: 'true',
        LOG_LEVEL: 'DEBUG'
      }
    )

    expect(config).toMatchObject({
      serverAddress: 'http://gpu-box:8188',
      pollInterval: 250,
      waitTimeout: 60000,
      stopOnError: false,
      logLevel: 'debug'
    })
  })

  it('should let explicit values win over the environment', () => {
    const config = loadConfig({ targetNodeId: '6' }, { COMFY_TARGET_NODE: '7' })

    expect(config.targetNodeId).toBe('6')
  })

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({}, { LOG_LEVEL: 'loud' })).toThrow(ConfigError)
  })
})

describe('parseDuration', () => {
  it('should accept non-negative numbers', () => {
    expect(parseDuration('cooldown', '0')).toBe(0)
    expect(parseDuration('cooldown', '1500')).toBe(1500)
  })

  it('should reject negative or non-numeric values', () => {
    expect(() => parseDuration('cooldown', '-1')).toThrow('cooldown must be a non-negative number of milliseconds, got "-1"')
    expect(() => parseDuration('cooldown', 'soon')).toThrow(ConfigError)
    expect(() => parseDuration('cooldown', '')).toThrow(ConfigError)
  })
})
