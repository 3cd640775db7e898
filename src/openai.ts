import OpenAI from 'openai';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { resolveProxyUrl, type EnvRecord, type ProviderSettings } from './providers';
import { OpenAiLlmAdapter, type ChatCompletionsClient } from './adapters/tools/OpenAiLlmAdapter';
import type { LlmPort } from './app/LlmPort';
import type { LoggerPort } from './ports/sys/LoggerPort';

/**
 * Every supported provider speaks the OpenAI chat-completions dialect, so one
 * SDK client serves them all; only the key, base URL and model differ.
 */
export function createOpenAI(settings: ProviderSettings, proxyUrl?: string): OpenAI {
  return new OpenAI({
    apiKey: settings.apiKey,
    baseURL: settings.baseURL,
    httpAgent: proxyUrl ? new HttpsProxyAgent(proxyUrl) : undefined,
  });
}

/** LLM factory for the container, routed through the proxy named in `env`. */
export function openAiLlmFactory(env: EnvRecord) {
  return (settings: ProviderSettings, logger: LoggerPort): LlmPort => {
    const openai = createOpenAI(settings, resolveProxyUrl(env));
    const client: ChatCompletionsClient = {
      create: (body) => openai.chat.completions.create(body),
    };
    return new OpenAiLlmAdapter(client, { provider: settings.provider, model: settings.model }, logger);
  };
}
