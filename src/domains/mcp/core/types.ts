import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js'

export type { CallToolResult, Tool }

export interface MCPServerConfig {
  name: string
  version: string
}

/**
 * Body of a failed tool call, serialized into the text content
 */
export interface ToolErrorPayload {
  error: string
  message: string
  suggestion?: string
  [key: string]: unknown
}

export function jsonResponse(payload: unknown, isError = false): CallToolResult {
  const result: CallToolResult = {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
  }
  if (isError) result.isError = true
  return result
}

export function errorResponse(payload: ToolErrorPayload): CallToolResult {
  return jsonResponse(payload, true)
}
