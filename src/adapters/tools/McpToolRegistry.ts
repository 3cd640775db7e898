import type {
  ToolDefinition,
  ToolExecutionResult,
  ToolRegistryPort,
} from "../../ports/tools/ToolRegistryPort";
import type { ToolServerPort } from "../../ports/mcp/ToolServerPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { SessionStateMachine } from "../../domain/session/SessionStateMachine";
import { formatToolResult } from "../../app/formatToolResult";
import { describeError } from "../../shared/errors";

const EMPTY_SCHEMA = { type: "object", properties: {} };

/**
 * Exposes the tools of a single MCP server session. The tool list is fetched
 * once on connect and served from memory afterwards.
 */
export class McpToolRegistry implements ToolRegistryPort {
  private readonly session = new SessionStateMachine();
  private tools: ToolDefinition[] = [];

  constructor(
    private readonly server: ToolServerPort,
    private readonly logger: LoggerPort
  ) {}

  async connect(): Promise<void> {
    this.session.onConnectStarted();
    try {
      await this.server.connect();
    } catch (err) {
      this.session.onConnectFailed();
      throw err;
    }
    this.session.onConnected();

    await this.loadTools();
    await this.loadResources();
    this.logger.info(`Connected to MCP server ${this.server.label}`);
  }

  list(): ToolDefinition[] {
    return this.tools.map((tool) => ({ ...tool }));
  }

  async exec(name: string, args: Record<string, unknown>): Promise<ToolExecutionResult> {
    if (!this.session.isConnected) {
      return { ok: false, message: "MCP session is not established." };
    }

    try {
      const outcome = await this.server.callTool(name, args);
      return { ok: !outcome.isError, message: formatToolResult(outcome) };
    } catch (err) {
      this.logger.error(`Tool ${name} failed`, { error: describeError(err) });
      return {
        ok: false,
        message: `Tool "${name}" failed: ${describeError(err)}`,
      };
    }
  }

  async close(): Promise<void> {
    if (!this.session.onClosed()) return;
    try {
      await this.server.close();
      this.logger.info("MCP connection closed");
    } catch (err) {
      this.logger.error("Failed to close MCP connection", { error: describeError(err) });
    }
  }

  private async loadTools() {
    try {
      const tools = await this.server.listTools();
      this.tools = tools.map((tool) => ({
        name: tool.name,
        description: tool.description ?? "",
        schema: tool.inputSchema ?? { ...EMPTY_SCHEMA },
      }));
      this.logger.info("Discovered tools", { tools: this.tools.map((tool) => tool.name) });
    } catch (err) {
      this.logger.error("Failed to load tools", { error: describeError(err) });
      this.tools = [];
    }
  }

  private async loadResources() {
    try {
      const resources = await this.server.listResources();
      this.logger.info("Discovered resources", {
        resources: resources.map((resource) => resource.uri),
      });
    } catch (err) {
      this.logger.error("Failed to load resources", { error: describeError(err) });
    }
  }
}
