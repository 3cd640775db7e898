import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageToolCall,
} from 'openai/resources';
import { OpenAiLlmAdapter } from '../../../src/adapters/tools/OpenAiLlmAdapter';
import type { LlmFunctionTool } from '../../../src/app/LlmPort';
import type { LoggerPort } from '../../../src/ports/sys/LoggerPort';
import { OPENROUTER_TOOLS_FALLBACK_MODEL } from '../../../src/providers';

function completion(content: string | null, toolCalls?: ChatCompletionMessageToolCall[]): ChatCompletion {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model: 'test-model',
    choices: [
      {
        index: 0,
        finish_reason: toolCalls ? 'tool_calls' : 'stop',
        logprobs: null,
        message: { role: 'assistant', content, refusal: null, tool_calls: toolCalls },
      },
    ],
  };
}

function makeClient() {
  return { create: jest.fn<Promise<ChatCompletion>, [ChatCompletionCreateParamsNonStreaming]>() };
}

function makeLogger(): jest.Mocked<LoggerPort> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

function toolUseUnsupported(): Error {
  return Object.assign(new Error('404 No endpoints found that support tool use'), { status: 404 });
}

const lintTool: LlmFunctionTool = {
  type: 'function',
  function: { name: 'lint_filter', description: 'Lint a filter', parameters: { type: 'object', properties: {} } },
};

describe('OpenAiLlmAdapter', () => {
  test('sends messages, tools and limits, and maps the reply', async () => {
    const client = makeClient();
    const adapter = new OpenAiLlmAdapter(client, { provider: 'openai', model: 'gpt-4o-mini' }, makeLogger());
    client.create.mockResolvedValueOnce(
      completion('  Checking.  ', [
        { id: 'call_1', type: 'function', function: { name: 'lint_filter', arguments: '{"filter":"x"}' } },
      ])
    );

    const result = await adapter.complete(
      [
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'hi' },
        {
          role: 'assistant',
          content: '',
          tool_calls: [{ id: 'call_0', name: 'list_providers', arguments: '{}' }],
        },
        { role: 'tool', tool_call_id: 'call_0', content: 'mp' },
      ],
      { tools: [lintTool], toolChoice: 'auto', maxTokens: 1200 }
    );

    expect(client.create).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      messages: [
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'hi' },
        {
          role: 'assistant',
          content: '',
          tool_calls: [{ id: 'call_0', type: 'function', function: { name: 'list_providers', arguments: '{}' } }],
        },
        { role: 'tool', tool_call_id: 'call_0', content: 'mp' },
      ],
      max_tokens: 1200,
      tools: [lintTool],
      tool_choice: 'auto',
    });
    expect(result).toEqual({
      text: 'Checking.',
      toolCalls: [{ id: 'call_1', name: 'lint_filter', arguments: '{"filter":"x"}' }],
    });
  });

  test('omits tools and token limit when none are given', async () => {
    const client = makeClient();
    const adapter = new OpenAiLlmAdapter(client, { provider: 'openai', model: 'gpt-4o-mini' }, makeLogger());
    client.create.mockResolvedValueOnce(completion('ok'));

    await adapter.complete([{ role: 'user', content: 'hi' }], { tools: [] });

    expect(client.create).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      messages: [{ role: 'user', content: 'hi' }],
    });
  });

  test('null content becomes empty text', async () => {
    const client = makeClient();
    const adapter = new OpenAiLlmAdapter(client, { provider: 'deepseek', model: 'deepseek-chat' }, makeLogger());
    client.create.mockResolvedValueOnce(completion(null));

    await expect(adapter.complete([{ role: 'user', content: 'hi' }])).resolves.toEqual({
      text: '',
      toolCalls: [],
    });
  });

  test('throws when the response carries no choices', async () => {
    const client = makeClient();
    const adapter = new OpenAiLlmAdapter(client, { provider: 'openai', model: 'gpt-4o-mini' }, makeLogger());
    client.create.mockResolvedValueOnce({ ...completion('x'), choices: [] });

    await expect(adapter.complete([{ role: 'user', content: 'hi' }])).rejects.toThrow(
      'LLM returned no assistant message.'
    );
  });

  test('OpenRouter routes without tool support fall back to the tools model', async () => {
    const client = makeClient();
    const logger = makeLogger();
    const adapter = new OpenAiLlmAdapter(
      client,
      { provider: 'openrouter', model: 'meta-llama/llama-3-8b-instruct' },
      logger
    );
    client.create.mockRejectedValueOnce(toolUseUnsupported()).mockResolvedValueOnce(completion('answer'));

    const result = await adapter.complete([{ role: 'user', content: 'hi' }], { tools: [lintTool] });

    expect(result.text).toBe('answer');
    expect(client.create).toHaveBeenCalledTimes(2);
    expect(client.create.mock.calls[0][0].model).toBe('meta-llama/llama-3-8b-instruct');
    expect(client.create.mock.calls[1][0].model).toBe(OPENROUTER_TOOLS_FALLBACK_MODEL);
    expect(adapter.model).toBe(OPENROUTER_TOOLS_FALLBACK_MODEL);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  test('the same error from other providers is rethrown', async () => {
    const client = makeClient();
    const adapter = new OpenAiLlmAdapter(client, { provider: 'openai', model: 'gpt-4o-mini' }, makeLogger());
    client.create.mockRejectedValueOnce(toolUseUnsupported());

    await expect(adapter.complete([{ role: 'user', content: 'hi' }], { tools: [lintTool] })).rejects.toThrow(
      'support tool use'
    );
    expect(client.create).toHaveBeenCalledTimes(1);
    expect(adapter.model).toBe('gpt-4o-mini');
  });

  test('OpenRouter does not fall back when no tools were sent', async () => {
    const client = makeClient();
    const adapter = new OpenAiLlmAdapter(client, { provider: 'openrouter', model: 'some/model' }, makeLogger());
    client.create.mockRejectedValueOnce(toolUseUnsupported());

    await expect(adapter.complete([{ role: 'user', content: 'hi' }])).rejects.toThrow('support tool use');
    expect(client.create).toHaveBeenCalledTimes(1);
  });

  test('a failure on the fallback model is not retried again', async () => {
    const client = makeClient();
    const adapter = new OpenAiLlmAdapter(
      client,
      { provider: 'openrouter', model: OPENROUTER_TOOLS_FALLBACK_MODEL },
      makeLogger()
    );
    client.create.mockRejectedValueOnce(toolUseUnsupported());

    await expect(adapter.complete([{ role: 'user', content: 'hi' }], { tools: [lintTool] })).rejects.toThrow(
      'support tool use'
    );
    expect(client.create).toHaveBeenCalledTimes(1);
  });
});
