import type { LlmFunctionTool, LlmMessage, LlmPort, LlmToolCall } from "./LlmPort";
import type {
  ToolDefinition,
  ToolExecutionResult,
  ToolRegistryPort,
} from "../ports/tools/ToolRegistryPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import { describeError } from "../shared/errors";

export const FIRST_TURN_MAX_TOKENS = 1200;
export const FOLLOW_UP_MAX_TOKENS = 1000;

export interface ExecutedToolCall {
  name: string;
  args: Record<string, unknown>;
  result: ToolExecutionResult;
}

export interface QueryOutcome {
  answer: string;
  chunks: string[];
}

export interface ToolOrchestratorOptions {
  systemPrompt: string;
}

export function buildToolSpecs(defs: ToolDefinition[]): LlmFunctionTool[] {
  return defs.map((def) => ({
    type: "function",
    function: {
      name: def.name,
      description: def.description,
      parameters: def.schema,
    },
  }));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function formatToolChunk(call: ExecutedToolCall): string {
  return `[tool call ${call.name}]\nargs: ${JSON.stringify(call.args)}\nresult:\n${call.result.message}`;
}

/**
 * One query, one round of tools: ask the model, run whatever tools it picks,
 * then ask once more (without tools) for the final answer.
 */
export class ToolOrchestrator {
  constructor(
    private readonly llm: LlmPort,
    private readonly tools: ToolRegistryPort,
    private readonly logger: LoggerPort,
    private readonly options: ToolOrchestratorOptions
  ) {}

  async run(query: string): Promise<QueryOutcome> {
    this.logger.info("Processing query", { query });

    const toolDefs = this.tools.list();
    const messages: LlmMessage[] = [
      { role: "system", content: this.options.systemPrompt },
      { role: "user", content: query },
    ];
    const chunks: string[] = [];

    const first = await this.llm.complete(messages, {
      tools: buildToolSpecs(toolDefs),
      toolChoice: toolDefs.length ? "auto" : "none",
      maxTokens: FIRST_TURN_MAX_TOKENS,
    });
    if (first.text) chunks.push(first.text);

    if (first.toolCalls.length) {
      messages.push({ role: "assistant", content: first.text, tool_calls: first.toolCalls });
      this.logger.debug("Model requested tools", {
        tools: first.toolCalls.map((call) => call.name),
      });

      for (const call of first.toolCalls) {
        const args = this.parseArguments(call);
        this.logger.info(`Calling tool ${call.name}`, { args });
        const result = await this.invokeTool(call.name, args);
        if (!result.ok) {
          this.logger.warn(`Tool ${call.name} reported an error`, { result: result.message });
        }
        chunks.push(formatToolChunk({ name: call.name, args, result }));
        messages.push({ role: "tool", tool_call_id: call.id, content: result.message });
      }

      // no tools on the follow-up so the model answers instead of calling again
      const followUp = await this.llm.complete(messages, { maxTokens: FOLLOW_UP_MAX_TOKENS });
      if (followUp.text) chunks.push(followUp.text);
    }

    return {
      answer: chunks.filter((chunk) => chunk.length > 0).join("\n"),
      chunks,
    };
  }

  private async invokeTool(name: string, args: Record<string, unknown>): Promise<ToolExecutionResult> {
    try {
      return await this.tools.exec(name, args);
    } catch (err) {
      return {
        ok: false,
        message: `Tool "${name}" failed: ${describeError(err)}`,
      };
    }
  }

  private parseArguments(call: LlmToolCall): Record<string, unknown> {
    if (!call.arguments.trim()) return {};
    try {
      const parsed: unknown = JSON.parse(call.arguments);
      if (isPlainObject(parsed)) return parsed;
      this.logger.warn(`Arguments for tool ${call.name} are not an object; passing empty object.`);
    } catch (err) {
      this.logger.warn(`Failed to parse arguments for tool ${call.name}; passing empty object.`, {
        error: describeError(err),
      });
    }
    return {};
  }
}
