import { ConfigurationError } from "./shared/errors";

export type ProviderName = "openai" | "openrouter" | "deepseek";

export type EnvRecord = Record<string, string | undefined>;

export interface ProviderSettings {
  provider: ProviderName;
  apiKey: string;
  baseURL?: string;
  model: string;
}

interface ProviderDefaults {
  keyVar: string;
  baseUrlVar: string;
  modelVar: string;
  defaultBaseURL?: string;
  defaultModel: string;
}

const PROVIDERS: Record<ProviderName, ProviderDefaults> = {
  openai: {
    keyVar: "OPENAI_API_KEY",
    baseUrlVar: "OPENAI_BASE_URL",
    modelVar: "OPENAI_MODEL",
    defaultModel: "gpt-4o-mini",
  },
  openrouter: {
    keyVar: "OPENROUTER_API_KEY",
    baseUrlVar: "OPENROUTER_BASE_URL",
    modelVar: "OPENROUTER_MODEL",
    defaultBaseURL: "https://openrouter.ai/api/v1",
    defaultModel: "openai/gpt-4o-mini",
  },
  deepseek: {
    keyVar: "DEEPSEEK_API_KEY",
    baseUrlVar: "DEEPSEEK_BASE_URL",
    modelVar: "DEEPSEEK_MODEL",
    defaultBaseURL: "https://api.deepseek.com",
    defaultModel: "deepseek-chat",
  },
};

/** Route OpenRouter falls back to when the configured one rejects tool use. */
export const OPENROUTER_TOOLS_FALLBACK_MODEL = "openai/gpt-4o-mini";

const PROXY_VARS = ["HTTPS_PROXY", "https_proxy", "HTTP_PROXY", "http_proxy", "ALL_PROXY", "all_proxy"];

function read(env: EnvRecord, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function isProviderName(value: string): value is ProviderName {
  return Object.prototype.hasOwnProperty.call(PROVIDERS, value);
}

export function resolveProviderSettings(env: EnvRecord, modelOverride?: string): ProviderSettings {
  const provider = (read(env, "API_PROVIDER") ?? "openai").toLowerCase();
  if (!isProviderName(provider)) {
    throw new ConfigurationError(
      `Unsupported API_PROVIDER "${provider}". Use one of: ${Object.keys(PROVIDERS).join(", ")}.`
    );
  }

  const defaults = PROVIDERS[provider];
  const apiKey = read(env, defaults.keyVar);
  if (!apiKey) {
    throw new ConfigurationError(`${defaults.keyVar} is not set.`);
  }

  return {
    provider,
    apiKey,
    baseURL: read(env, defaults.baseUrlVar) ?? defaults.defaultBaseURL,
    model: modelOverride?.trim() || read(env, defaults.modelVar) || defaults.defaultModel,
  };
}

export function resolveProxyUrl(env: EnvRecord): string | undefined {
  for (const name of PROXY_VARS) {
    const value = read(env, name);
    if (value) return value;
  }
  return undefined;
}
