import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from "openai/resources";
import type { Completion, CompletionOptions, LlmMessage, LlmPort, LlmToolCall } from "../../app/LlmPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { OPENROUTER_TOOLS_FALLBACK_MODEL, type ProviderName } from "../../providers";

/** The slice of the OpenAI SDK this adapter talks to. */
export interface ChatCompletionsClient {
  create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
}

export interface OpenAiLlmAdapterOptions {
  provider: ProviderName;
  model: string;
}

function toChatMessage(msg: LlmMessage): ChatCompletionMessageParam {
  switch (msg.role) {
    case "system":
      return { role: "system", content: msg.content };
    case "user":
      return { role: "user", content: msg.content };
    case "tool":
      return { role: "tool", content: msg.content, tool_call_id: msg.tool_call_id };
    case "assistant":
      if (msg.tool_calls?.length) {
        return {
          role: "assistant",
          content: msg.content,
          tool_calls: msg.tool_calls.map((call) => ({
            id: call.id,
            type: "function" as const,
            function: { name: call.name, arguments: call.arguments },
          })),
        };
      }
      return { role: "assistant", content: msg.content };
  }
}

function preview(msg: LlmMessage): Record<string, unknown> {
  const summary: Record<string, unknown> = {
    role: msg.role,
    preview: msg.content.slice(0, 80),
  };
  if (msg.role === "assistant" && msg.tool_calls?.length) {
    summary.tool_calls = msg.tool_calls.map((call) => call.name);
  }
  if (msg.role === "tool") {
    summary.tool_call_id = msg.tool_call_id;
  }
  return summary;
}

// OpenRouter answers 404 "No endpoints found that support tool use" for routes
// without function calling.
function isToolUseUnsupported(err: unknown): boolean {
  return (
    err instanceof Error &&
    "status" in err &&
    err.status === 404 &&
    /support tool use/i.test(err.message)
  );
}

export class OpenAiLlmAdapter implements LlmPort {
  private currentModel: string;

  constructor(
    private readonly client: ChatCompletionsClient,
    private readonly options: OpenAiLlmAdapterOptions,
    private readonly logger: LoggerPort
  ) {
    this.currentModel = options.model;
  }

  get model(): string {
    return this.currentModel;
  }

  async complete(messages: LlmMessage[], options: CompletionOptions = {}): Promise<Completion> {
    const requestMessages = messages.map(toChatMessage);
    this.logger.debug("LLM request", {
      model: this.currentModel,
      messages: messages.map(preview),
      tools: options.tools?.map((tool) => tool.function.name) ?? [],
    });

    const buildBody = (): ChatCompletionCreateParamsNonStreaming => {
      const body: ChatCompletionCreateParamsNonStreaming = {
        model: this.currentModel,
        messages: requestMessages,
      };
      if (options.maxTokens) body.max_tokens = options.maxTokens;
      if (options.tools?.length) {
        body.tools = options.tools;
        body.tool_choice = options.toolChoice ?? "auto";
      }
      return body;
    };

    let resp: ChatCompletion;
    try {
      resp = await this.client.create(buildBody());
    } catch (err) {
      if (!this.shouldFallBack(err, options)) throw err;
      this.logger.warn(
        `OpenRouter route ${this.currentModel} does not support tools; falling back to ${OPENROUTER_TOOLS_FALLBACK_MODEL}`
      );
      this.currentModel = OPENROUTER_TOOLS_FALLBACK_MODEL;
      resp = await this.client.create(buildBody());
    }

    const message = resp.choices[0]?.message;
    if (!message) {
      throw new Error("LLM returned no assistant message.");
    }

    const toolCalls: LlmToolCall[] = (message.tool_calls ?? [])
      .filter((call) => call.type === "function")
      .map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: call.function.arguments,
      }));

    return {
      text: message.content?.trim() ?? "",
      toolCalls,
    };
  }

  private shouldFallBack(err: unknown, options: CompletionOptions): boolean {
    return (
      this.options.provider === "openrouter" &&
      Boolean(options.tools?.length) &&
      this.currentModel !== OPENROUTER_TOOLS_FALLBACK_MODEL &&
      isToolUseUnsupported(err)
    );
  }
}
