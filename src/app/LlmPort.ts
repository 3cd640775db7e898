import type { JsonSchema } from "../ports/tools/ToolRegistryPort";

export interface LlmToolCall {
  id: string;
  name: string;
  /** Raw JSON text exactly as the model produced it. */
  arguments: string;
}

export type LlmMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | {
      role: "assistant";
      content: string;
      // OpenAI expects the assistant message declaring tool calls to precede
      // the "tool" messages that answer them.
      tool_calls?: LlmToolCall[];
    }
  | { role: "tool"; content: string; tool_call_id: string };

export interface LlmFunctionTool {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: JsonSchema;
  };
}

export interface CompletionOptions {
  tools?: LlmFunctionTool[];
  toolChoice?: "auto" | "none";
  maxTokens?: number;
}

export interface Completion {
  text: string;
  toolCalls: LlmToolCall[];
}

export interface LlmPort {
  readonly model: string;
  complete(messages: LlmMessage[], options?: CompletionOptions): Promise<Completion>;
}
