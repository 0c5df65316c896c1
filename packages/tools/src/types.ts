/** Provider-agnostic tool description: name, prose, and a JSON Schema for the input. */
export interface ToolDefinition {
  name: string
  description: string
  inputSchema: Record<string, unknown>
}
