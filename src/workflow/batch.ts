import path from 'path'
import type { ComfyClient } from '@/api/client'
import type { BatchConfig, BatchResult } from '@/types/batch'
import type { WorkflowGraph } from '@/types/prompt'
import { createLogger } from '@/lib/logger'
import { errorMessage, sleep } from '@/lib/utils'
import { cloneWorkflow, setNodeInput } from './graph'

const log = createLogger('Batch')

export function jobDirName(index: number): string {
  return `story_${index + 1}`
}

export interface BatchHooks {
  sleep?: (ms: number) => Promise<void>
  onResult?: (result: BatchResult) => void
}

/**
 * Run one job per prompt, strictly in order. Each job gets its own copy of
 * `baseGraph` with the target input replaced by the prompt.
 */
export async function runBatch(
  client: ComfyClient,
  baseGraph: WorkflowGraph,
  prompts: string[],
  config: BatchConfig,
  hooks: BatchHooks = {}
): Promise<BatchResult[]> {
  const wait = hooks.sleep ?? sleep
  const results: BatchResult[] = []

  for (const [index, prompt] of prompts.entries()) {
    log.info(`===== Job ${index + 1}/${prompts.length} =====`)
    log.info(`Prompt: ${prompt}`)

    const start = Date.now()
    const outputDir = path.join(config.outputDir, jobDirName(index))
    const graph = setNodeInput(cloneWorkflow(baseGraph), config.targetNodeId, config.targetInput, prompt)
    const result: BatchResult = {
      index,
      prompt,
      outputDir,
      promptId: null,
      files: [],
      error: null,
      timing: 0
    }

    let failure: { error: unknown } | null = null
    try {
      const promptId = await client.submit(graph)
      result.promptId = promptId
      await client.waitForCompletion(promptId, {
        pollInterval: config.pollInterval,
        timeout: config.waitTimeout
      })
      result.files = await client.downloadOutputs(promptId, outputDir)
      log.info(`Generated ${result.files.length} image(s)`)
      for (const file of result.files) log.info(` - ${file}`)
    } catch (error) {
      result.error = errorMessage(error)
      failure = { error }
      // A stopping batch rethrows, and the caller logs it
      if (!config.stopOnError) log.error(`Job ${index + 1} failed:`, error)
    }

    result.timing = Date.now() - start
    results.push(result)
    hooks.onResult?.(result)

    if (failure && config.stopOnError) throw failure.error

    if (index < prompts.length - 1 && config.cooldown > 0) {
      await wait(config.cooldown)
    }
  }

  return results
}
