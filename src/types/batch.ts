export interface BatchConfig {
  targetNodeId: string
  targetInput: string
  outputDir: string
  pollInterval: number
  cooldown: number // delay between jobs, ms
  waitTimeout?: number
  stopOnError: boolean // Stop batch on first error or continue
}

export interface BatchResult {
  index: number
  prompt: string
  outputDir: string
  promptId: string | null
  files: string[]
  error: string | null
  timing: number
}

export const DEFAULT_BATCH_CONFIG: BatchConfig = {
  targetNodeId: '32',
  targetInput: 'text',
  outputDir: 'output',
  pollInterval: 1000,
  cooldown: 2000,
  stopOnError: true
}
