import { parseArgs } from 'util'
import { ComfyClient } from '@/api/client'
import { loadConfig, parseDuration, type AppConfig } from '@/config'
import { createLogger, setLogLevel } from '@/lib/logger'
import { loadWorkflow } from '@/workflow/graph'
import { loadPagePrompts } from '@/workflow/prompts'
import { runBatch, type BatchHooks } from '@/workflow/batch'

const log = createLogger('CLI')

export const USAGE = `Usage: comfy-batch [options]

  --server <url>          ComfyUI server address
  --workflow <path>       API-format workflow JSON
  --prompts <dir>         folder of { pages: [{ image }] } documents
  --output <dir>          root folder for downloaded images
  --node <id>             node whose input receives each prompt
  --input <name>          input name on that node
  --poll-interval <ms>    queue polling interval
  --cooldown <ms>         pause between jobs
  --timeout <ms>          give up waiting on a job after this long (0: never)
  --continue-on-error     keep going when a job fails
  --verbose               debug logging
  -h, --help              show this help`

export function parseCliArgs(argv: string[]): { help: boolean; overrides: Partial<AppConfig> } {
  const { values } = parseArgs({
    args: argv,
    options: {
      server: { type: 'string' },
      workflow: { type: 'string' },
      prompts: { type: 'string' },
      output: { type: 'string' },
      node: { type: 'string' },
      input: { type: 'string' },
      'poll-interval': { type: 'string' },
      cooldown: { type: 'string' },
      timeout: { type: 'string' },
      'continue-on-error': { type: 'boolean' },
      verbose: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' }
    },
    strict: true
  })

  const overrides: Partial<AppConfig> = {}
  if (values.server) overrides.serverAddress = values.server
  if (values.workflow) overrides.workflowPath = values.workflow
  if (values.prompts) overrides.promptsDir = values.prompts
  if (values.output) overrides.outputDir = values.output
  if (values.node) overrides.targetNodeId = values.node
  if (values.input) overrides.targetInput = values.input
  if (values['poll-interval']) overrides.pollInterval = parseDuration('--poll-interval', values['poll-interval'])
  if (values.cooldown) overrides.cooldown = parseDuration('--cooldown', values.cooldown)
  if (values.timeout) overrides.waitTimeout = parseDuration('--timeout', values.timeout)
  if (values['continue-on-error']) overrides.stopOnError = false
  if (values.verbose) overrides.logLevel = 'debug'

  return { help: values.help ?? false, overrides }
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv
  createClient?: (config: AppConfig) => ComfyClient
  hooks?: BatchHooks
}

/** Returns the process exit code; never rejects. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  try {
    const { help, overrides } = parseCliArgs(argv)
    if (help) {
      console.log(USAGE)
      return 0
    }

    const config = loadConfig(overrides, deps.env)
    setLogLevel(config.logLevel)

    const client = deps.createClient?.(config) ?? new ComfyClient({ serverAddress: config.serverAddress })
    log.info(`Client ready for ${client.serverAddress}`)

    log.info(`Loading workflow '${config.workflowPath}'...`)
    const workflow = await loadWorkflow(config.workflowPath)

    const prompts = await loadPagePrompts(config.promptsDir)
    if (prompts.length === 0) {
      log.warn(`No prompts found in '${config.promptsDir}', nothing to do`)
      return 0
    }

    const results = await runBatch(client, workflow, prompts, config, deps.hooks)
    const failed = results.filter((r) => r.error !== null).length
    const images = results.reduce((sum, r) => sum + r.files.length, 0)
    log.info(`Done: ${results.length} job(s), ${failed} failed, ${images} image(s)`)
    return failed > 0 ? 1 : 0
  } catch (error) {
    log.error('Run failed:', error)
    return 1
  }
}
