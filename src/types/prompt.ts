export interface WorkflowNode {
  class_type?: string
  inputs?: Record<string, unknown>
  _meta?: {
    title?: string
  }
  [key: string]: unknown
}

/**
 * API-format workflow: node id -> node. Nodes are usually `WorkflowNode`
 * shaped, but the document is passed through as-is and the server judges it.
 */
export type WorkflowGraph = Record<string, unknown>

export interface PromptRequest {
  prompt: WorkflowGraph
  client_id: string
}

export interface QueueSnapshot {
  running: string[]
  pending: string[]
}

// Descriptors usually carry `subfolder` and `type` strings too
export interface OutputFile {
  filename: string
  [key: string]: unknown
}

/** output kind (e.g. "images") -> files */
export type NodeOutput = Record<string, unknown>

export interface HistoryRecord {
  outputs?: Record<string, NodeOutput>
  [key: string]: unknown
}

export interface RunResult {
  promptId: string
  files: string[]
}
