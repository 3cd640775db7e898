import type { JsonSchema } from "../tools/ToolRegistryPort";

export interface ServerTool {
  name: string;
  description?: string;
  inputSchema?: JsonSchema;
}

export interface ServerResource {
  uri: string;
  name?: string;
  mimeType?: string;
}

export type ToolContent =
  | { type: "text"; text: string }
  | { type: "image"; data: string; mimeType: string }
  | { type: "audio"; data: string; mimeType: string }
  | { type: "resource"; uri: string; text?: string; mimeType?: string }
  | { type: "other"; value: unknown };

export interface ToolCallOutcome {
  content: ToolContent[];
  structuredContent?: Record<string, unknown>;
  isError: boolean;
}

/** A connection to one MCP server. */
export interface ToolServerPort {
  readonly label: string;
  connect(): Promise<void>;
  listTools(): Promise<ServerTool[]>;
  listResources(): Promise<ServerResource[]>;
  callTool(name: string, args: Record<string, unknown>): Promise<ToolCallOutcome>;
  close(): Promise<void>;
}
