export type JsonSchema = Record<string, unknown>;

export interface ToolExecutionResult {
  ok: boolean;
  message: string;
}

export interface ToolDefinition {
  name: string;
  description: string;
  schema: JsonSchema;
}

export interface ToolRegistryPort {
  list(): ToolDefinition[];
  exec(name: string, args: Record<string, unknown>): Promise<ToolExecutionResult>;
}
