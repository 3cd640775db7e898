import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type {
  ServerResource,
  ServerTool,
  ToolCallOutcome,
  ToolContent,
  ToolServerPort,
} from "../../ports/mcp/ToolServerPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { describeTarget, type ServerTarget } from "../../serverTarget";

export const CLIENT_INFO = { name: "optimade-mcp-client", version: "0.1.0" } as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function createTransport(target: ServerTarget): Transport {
  switch (target.transport) {
    case "stdio":
      return new StdioClientTransport({ command: target.command, args: target.args });
    case "http":
      return new StreamableHTTPClientTransport(new URL(target.url));
    case "sse":
      return new SSEClientTransport(new URL(target.url));
  }
}

export function normalizeToolContent(block: unknown): ToolContent {
  if (!isRecord(block)) return { type: "other", value: block };
  const type = block.type;

  if (type === "text" && typeof block.text === "string") {
    return { type: "text", text: block.text };
  }
  if ((type === "image" || type === "audio") && typeof block.data === "string") {
    return {
      type,
      data: block.data,
      mimeType: optionalString(block.mimeType) ?? "application/octet-stream",
    };
  }
  if (type === "resource" && isRecord(block.resource) && typeof block.resource.uri === "string") {
    return {
      type: "resource",
      uri: block.resource.uri,
      text: optionalString(block.resource.text),
      mimeType: optionalString(block.resource.mimeType),
    };
  }
  if (type === "resource_link" && typeof block.uri === "string") {
    return { type: "resource", uri: block.uri, mimeType: optionalString(block.mimeType) };
  }
  return { type: "other", value: block };
}

/**
 * The SDK types `callTool` loosely (it also admits the pre-2024-11 `toolResult`
 * shape), so results are narrowed here instead of trusted.
 */
export function normalizeCallToolResult(raw: unknown): ToolCallOutcome {
  if (!isRecord(raw)) {
    return { content: [{ type: "other", value: raw }], isError: false };
  }
  if (!Array.isArray(raw.content) && "toolResult" in raw) {
    return { content: [{ type: "other", value: raw.toolResult }], isError: false };
  }
  return {
    content: Array.isArray(raw.content) ? raw.content.map(normalizeToolContent) : [],
    structuredContent: isRecord(raw.structuredContent) ? raw.structuredContent : undefined,
    isError: raw.isError === true,
  };
}

export class McpSdkToolServer implements ToolServerPort {
  readonly label: string;
  private readonly client = new Client({ ...CLIENT_INFO });

  constructor(
    private readonly target: ServerTarget,
    private readonly logger: LoggerPort
  ) {
    this.label = describeTarget(target);
  }

  async connect(): Promise<void> {
    this.logger.info(`Connecting to MCP server ${this.label}`, { transport: this.target.transport });
    await this.client.connect(createTransport(this.target));
  }

  async listTools(): Promise<ServerTool[]> {
    const response = await this.client.listTools();
    return response.tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: { ...tool.inputSchema },
    }));
  }

  async listResources(): Promise<ServerResource[]> {
    const response = await this.client.listResources();
    return response.resources.map((resource) => ({
      uri: resource.uri,
      name: resource.name,
      mimeType: resource.mimeType,
    }));
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<ToolCallOutcome> {
    const raw: unknown = await this.client.callTool({ name, arguments: args });
    return normalizeCallToolResult(raw);
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
