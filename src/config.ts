/**
 * Runtime settings: defaults, overridden by environment variables, overridden
 * by explicit (CLI) values.
 */
import { DEFAULT_SERVER_ADDRESS } from '@/api/client'
import { DEFAULT_BATCH_CONFIG, type BatchConfig } from '@/types/batch'
import { isLogLevel, type LogLevel } from '@/lib/logger'

export interface AppConfig extends BatchConfig {
  serverAddress: string
  workflowPath: string
  promptsDir: string
  logLevel: LogLevel
}

export const DEFAULT_CONFIG: AppConfig = {
  ...DEFAULT_BATCH_CONFIG,
  serverAddress: DEFAULT_SERVER_ADDRESS,
  workflowPath: 'workflow.json',
  promptsDir: 'stories',
  logLevel: 'info'
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export function parseDuration(name: string, raw: string): number {
  const value = Number(raw)
  if (raw.trim() === '' || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative number of milliseconds, got "${raw}"`)
  }
  return value
}

export function parseLogLevel(raw: string): LogLevel {
  const level = raw.toLowerCase()
  if (!isLogLevel(level)) {
    throw new ConfigError(`Unknown log level "${raw}"`)
  }
  return level
}

function parseFlag(raw: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase())
}

export function configFromEnv(env: NodeJS.ProcessEnv): Partial<AppConfig> {
  const config: Partial<AppConfig> = {}
  if (env.COMFY_SERVER_URL) config.serverAddress = env.COMFY_SERVER_URL
  if (env.COMFY_WORKFLOW) config.workflowPath = env.COMFY_WORKFLOW
  if (env.COMFY_PROMPTS_DIR) config.promptsDir = env.COMFY_PROMPTS_DIR
  if (env.COMFY_OUTPUT_DIR) config.outputDir = env.COMFY_OUTPUT_DIR
  if (env.COMFY_TARGET_NODE) config.targetNodeId = env.COMFY_TARGET_NODE
  if (env.COMFY_TARGET_INPUT) config.targetInput = env.COMFY_TARGET_INPUT
  if (env.COMFY_POLL_INTERVAL) config.pollInterval = parseDuration('COMFY_POLL_INTERVAL', env.COMFY_POLL_INTERVAL)
  if (env.COMFY_COOLDOWN) config.cooldown = parseDuration('COMFY_COOLDOWN', env.COMFY_COOLDOWN)
  if (env.COMFY_WAIT_TIMEOUT) config.waitTimeout = parseDuration('COMFY_WAIT_TIMEOUT', env.COMFY_WAIT_TIMEOUT)
  if (env.COMFY_CONTINUE_ON_ERROR) config.stopOnError = !parseFlag(env.COMFY_CONTINUE_ON_ERROR)
  if (env.LOG_LEVEL) config.logLevel = parseLogLevel(env.LOG_LEVEL)
  return config
}

export function loadConfig(
  overrides: Partial<AppConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  return { ...DEFAULT_CONFIG, ...configFromEnv(env), ...overrides }
}
