/**
 * Workflow graph helpers: load an API-format workflow from disk, copy it per
 * job, and patch a single node input.
 */
import fs from 'fs/promises'
import type { WorkflowGraph } from '@/types/prompt'
import { createLogger } from '@/lib/logger'
import { errorMessage, isRecord } from '@/lib/utils'

const log = createLogger('Workflow')

export type WorkflowFileErrorReason = 'not_found' | 'parse_error'

export class WorkflowFileError extends Error {
  reason: WorkflowFileErrorReason
  path: string

  constructor(reason: WorkflowFileErrorReason, filePath: string, message: string) {
    super(message)
    this.name = 'WorkflowFileError'
    this.reason = reason
    this.path = filePath
  }
}


export async function loadWorkflow(filePath: string): Promise<WorkflowGraph> {
  let text: string
  try {
    text = await fs.readFile(filePath, 'utf-8')
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') {
      throw new WorkflowFileError('not_found', filePath, `Workflow file not found: ${filePath}`)
    }
    throw error
  }

  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (error) {
    throw new WorkflowFileError('parse_error', filePath, `Invalid workflow JSON in ${filePath}: ${errorMessage(error)}`)
  }

  // Node contents are left for the server to judge
  if (!isRecord(data)) {
    throw new WorkflowFileError('parse_error', filePath, `Workflow in ${filePath} is not a JSON object`)
  }
  return data
}

export function cloneWorkflow(graph: WorkflowGraph): WorkflowGraph {
  return structuredClone(graph)
}

/**
 * Overwrite `inputs[inputName]` of node `nodeId` in place. A missing node or
 * input only logs a warning; the graph comes back untouched.
 */
export function setNodeInput(
  graph: WorkflowGraph,
  nodeId: string,
  inputName: string,
  value: unknown
): WorkflowGraph {
  const node = Object.hasOwn(graph, nodeId) ? graph[nodeId] : undefined
  if (!isRecord(node)) {
    log.warn(`Node ${nodeId} not found in workflow`)
    return graph
  }

  const inputs = node.inputs
  if (!isRecord(inputs) || !Object.hasOwn(inputs, inputName)) {
    log.warn(`Node ${nodeId} has no input "${inputName}"`)
    return graph
  }

  inputs[inputName] = value
  log.info(`Updated ${inputName} on node ${nodeId}`)
  return graph
}
