import axios, { AxiosError, type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios'
import { v4 as uuidv4 } from 'uuid'
import fs from 'fs/promises'
import path from 'path'
import type {
  HistoryRecord,
  NodeOutput,
  OutputFile,
  PromptRequest,
  QueueSnapshot,
  RunResult,
  WorkflowGraph
} from '@/types/prompt'
import { createLogger } from '@/lib/logger'
import { abortError, errorMessage, isRecord, sleep, toId } from '@/lib/utils'

export const DEFAULT_SERVER_ADDRESS = 'http://127.0.0.1:8188'
export const DEFAULT_POLL_INTERVAL = 1000

const log = createLogger('ComfyClient')

export class APIError extends Error {
  status?: number
  details?: unknown

  constructor(message: string, options?: { status?: number; details?: unknown }) {
    super(message)
    this.name = 'APIError'
    this.status = options?.status
    this.details = options?.details
  }
}

export class SubmitError extends APIError {
  constructor(status: number, body: unknown) {
    super(`Failed to queue prompt: ${status}, ${stringifyBody(body)}`, { status, details: body })
    this.name = 'SubmitError'
  }
}

export class MissingPromptIdError extends APIError {
  constructor(body: unknown) {
    super(`No prompt id in response: ${stringifyBody(body)}`, { details: body })
    this.name = 'MissingPromptIdError'
  }
}

export class WaitTimeoutError extends APIError {
  promptId: string

  constructor(promptId: string, timeout: number) {
    super(`Prompt ${promptId} did not finish within ${timeout}ms`)
    this.name = 'WaitTimeoutError'
    this.promptId = promptId
  }
}

function stringifyBody(body: unknown): string {
  if (typeof body === 'string') return body
  try {
    return JSON.stringify(body)
  } catch {
    return String(body)
  }
}

export function extractErrorMessage(error: unknown): string {
  if (error instanceof AxiosError) {
    if (error.code === 'ECONNABORTED' || error.message.includes('timeout')) {
      return 'Request timed out. The server may be busy.'
    }
    if (error.code === 'ECONNREFUSED' || error.code === 'ERR_NETWORK') {
      return `Network error: unable to connect to ${error.config?.baseURL ?? 'the server'}.`
    }
    const status = error.response?.status
    if (status) {
      return `HTTP ${status}${error.response?.statusText ? ': ' + error.response.statusText : ''}`
    }
    if (error.message) return error.message
  }
  if (error instanceof Error) return error.message
  return String(error)
}

function createAPIError(error: unknown, fallbackMessage: string): APIError {
  if (error instanceof APIError) return error
  const message = extractErrorMessage(error) || fallbackMessage
  const axiosError = error instanceof AxiosError ? error : null
  return new APIError(`${fallbackMessage}: ${message}`, {
    status: axiosError?.response?.status,
    details: axiosError?.response?.data
  })
}

function isOk(status: number): boolean {
  return status >= 200 && status < 300
}

type PromptIdStrategy = (data: unknown) => string

// Tried in order; the first non-empty id wins
const PROMPT_ID_STRATEGIES: PromptIdStrategy[] = [
  (data) => (isRecord(data) ? toId(data.prompt_id) : ''),
  (data) => (isRecord(data) ? toId(data.id) : ''),
  (data) => (Array.isArray(data) && data.length > 0 ? toId(data[0]) : '')
]

export function extractPromptId(data: unknown): string {
  for (const strategy of PROMPT_ID_STRATEGIES) {
    const promptId = strategy(data)
    if (promptId) return promptId
  }
  return ''
}

function parseQueueEntries(entries: unknown): string[] {
  if (!Array.isArray(entries)) return []
  const ids: string[] = []
  for (const entry of entries) {
    if (isRecord(entry) && 'prompt_id' in entry) {
      ids.push(toId(entry.prompt_id))
    } else if (Array.isArray(entry) && entry.length > 0) {
      ids.push(toId(entry[0]))
    }
  }
  return ids
}

export function parseQueue(data: unknown): QueueSnapshot {
  if (!isRecord(data)) return { running: [], pending: [] }
  return {
    running: parseQueueEntries(data.queue_running),
    pending: parseQueueEntries(data.queue_pending)
  }
}

function parseHistoryRecord(raw: Record<string, unknown>): HistoryRecord {
  const record: HistoryRecord = {}
  for (const [key, value] of Object.entries(raw)) {
    if (key !== 'outputs') record[key] = value
  }
  if (isRecord(raw.outputs)) {
    const outputs: Record<string, NodeOutput> = {}
    for (const [nodeId, nodeOutput] of Object.entries(raw.outputs)) {
      if (isRecord(nodeOutput)) outputs[nodeId] = nodeOutput
    }
    record.outputs = outputs
  }
  return record
}

function isOutputFile(value: unknown): value is OutputFile {
  return isRecord(value) && typeof value.filename === 'string' && value.filename !== ''
}

export interface ComfyClientOptions {
  serverAddress?: string
  /** Sent as `client_id` when submit() gets no tag. Defaults to a fresh UUID. */
  clientId?: string
  /** Per-request timeout in ms; 0 disables it. */
  requestTimeout?: number
  adapter?: AxiosAdapter
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
}

export interface WaitOptions {
  pollInterval?: number
  /** Give up after this many ms. Unbounded when omitted or 0. */
  timeout?: number
  signal?: AbortSignal
}

export interface RunOptions extends WaitOptions {
  clientTag?: string
}

export class ComfyClient {
  readonly serverAddress: string
  readonly clientId: string
  private client: AxiosInstance
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>

  constructor(options: ComfyClientOptions = {}) {
    this.serverAddress = (options.serverAddress ?? DEFAULT_SERVER_ADDRESS).replace(/\/+$/, '')
    this.clientId = options.clientId ?? uuidv4()
    this.sleep = options.sleep ?? sleep
    this.client = axios.create({
      baseURL: this.serverAddress,
      timeout: options.requestTimeout ?? 60000,
      headers: {
        'Content-Type': 'application/json'
      },
      // Status handling differs per endpoint, so every response resolves
      validateStatus: () => true,
      ...(options.adapter && { adapter: options.adapter })
    })
  }

  async submit(graph: WorkflowGraph, clientTag?: string): Promise<string> {
    const body: PromptRequest = {
      prompt: graph,
      client_id: clientTag ?? this.clientId
    }

    let response: AxiosResponse<unknown>
    try {
      response = await this.client.post<unknown>('/prompt', body)
    } catch (error) {
      throw createAPIError(error, 'Failed to queue prompt')
    }

    if (!isOk(response.status)) {
      throw new SubmitError(response.status, response.data)
    }
    log.debug('Response data:', response.data)

    const promptId = extractPromptId(response.data)
    if (!promptId) {
      throw new MissingPromptIdError(response.data)
    }

    log.info(`Prompt queued, id: ${promptId}`)
    return promptId
  }

  async getQueue(signal?: AbortSignal): Promise<QueueSnapshot> {
    let response: AxiosResponse<unknown>
    try {
      response = await this.client.get<unknown>('/queue', { ...(signal && { signal }) })
    } catch (error) {
      throw createAPIError(error, 'Failed to fetch queue')
    }

    if (!isOk(response.status)) {
      throw new APIError(`Queue status check failed: HTTP ${response.status}`, {
        status: response.status,
        details: response.data
      })
    }
    return parseQueue(response.data)
  }

  /**
   * Poll the queue until `promptId` is neither running nor pending and
   * nothing else is running. A non-2xx queue response is retried after the
   * same interval; transport errors propagate.
   */
  async waitForCompletion(promptId: string, options: WaitOptions = {}): Promise<boolean> {
    const { pollInterval = DEFAULT_POLL_INTERVAL, timeout, signal } = options
    const startTime = Date.now()

    log.info(`Waiting for prompt ${promptId} to finish...`)
    while (true) {
      if (signal?.aborted) throw abortError()
      if (timeout && Date.now() - startTime > timeout) {
        throw new WaitTimeoutError(promptId, timeout)
      }

      let snapshot: QueueSnapshot
      try {
        snapshot = await this.getQueue(signal)
      } catch (error) {
        if (signal?.aborted) throw abortError()
        // Only HTTP-level failures carry a status
        if (error instanceof APIError && error.status !== undefined) {
          log.warn(error.message)
          await this.sleep(pollInterval, signal)
          continue
        }
        throw error
      }

      const { running, pending } = snapshot
      log.debug('Running:', running)
      log.debug('Pending:', pending)

      if (!running.includes(promptId) && !pending.includes(promptId) && running.length === 0) {
        log.info(`Prompt ${promptId} finished`)
        return true
      }

      await this.sleep(pollInterval, signal)
    }
  }

  /** Look up one prompt in the server's full history. Unknown ids yield `{}`. */
  async getHistory(promptId: string): Promise<HistoryRecord> {
    let response: AxiosResponse<unknown>
    try {
      response = await this.client.get<unknown>('/history')
    } catch (error) {
      throw createAPIError(error, 'Failed to fetch history')
    }

    if (!isOk(response.status)) {
      throw new APIError(`Failed to fetch history: HTTP ${response.status}`, {
        status: response.status,
        details: response.data
      })
    }

    const raw = isRecord(response.data) ? response.data[promptId] : undefined
    if (!isRecord(raw)) {
      log.warn(`No history for prompt ${promptId}`)
      return {}
    }
    return parseHistoryRecord(raw)
  }

  async downloadOutputs(promptId: string, outputDir: string): Promise<string[]> {
    const history = await this.getHistory(promptId)

    if (!history.outputs) {
      log.warn(`No outputs for prompt ${promptId}`)
      return []
    }

    try {
      await fs.mkdir(outputDir, { recursive: true })
    } catch (error) {
      log.error(`Cannot create output folder ${outputDir}:`, errorMessage(error))
      return []
    }

    const downloaded: string[] = []
    for (const nodeOutput of Object.values(history.outputs)) {
      for (const [kind, files] of Object.entries(nodeOutput)) {
        if (kind !== 'images' || !Array.isArray(files)) continue
        for (const file of files) {
          if (!isOutputFile(file)) continue
          const localPath = await this.downloadFile(file, outputDir)
          if (localPath) downloaded.push(localPath)
        }
      }
    }
    return downloaded
  }

  async run(graph: WorkflowGraph, outputDir: string, options: RunOptions = {}): Promise<RunResult> {
    const { clientTag, ...waitOptions } = options
    const promptId = await this.submit(graph, clientTag)
    await this.waitForCompletion(promptId, waitOptions)
    const files = await this.downloadOutputs(promptId, outputDir)
    return { promptId, files }
  }

  private async downloadFile(file: OutputFile, outputDir: string): Promise<string | null> {
    const params: Record<string, string> = { filename: file.filename }
    if (typeof file.subfolder === 'string' && file.subfolder) params.subfolder = file.subfolder
    if (typeof file.type === 'string' && file.type) params.type = file.type

    const localPath = path.join(outputDir, path.basename(file.filename))
    try {
      const response = await this.client.get<ArrayBuffer>('/view', {
        params,
        responseType: 'arraybuffer'
      })
      if (!isOk(response.status)) {
        log.warn(`Image download failed: ${file.filename}, status code: ${response.status}`)
        return null
      }
      await fs.writeFile(localPath, Buffer.from(response.data))
      log.info(`Image downloaded: ${localPath}`)
      return localPath
    } catch (error) {
      log.error(`Image download failed: ${file.filename}:`, extractErrorMessage(error))
      return null
    }
  }
}
