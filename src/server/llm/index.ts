/**
 * LLM Provider factory.
 *
 * Selects the active provider based on the LLM_PROVIDER environment variable.
 * Defaults to "anthropic".
 *
 * Environment variables:
 *   LLM_PROVIDER  - "anthropic" | "openai" | "gemini"  (default: "anthropic")
 *   LLM_MODEL     - Model identifier override (provider-specific)
 *   LLM_API_KEY   - API key (falls back to provider-specific vars:
 *                    ANTHROPIC_API_KEY, OPENAI_API_KEY, GOOGLE_API_KEY)
 */

import type { LLMProvider, LLMProviderName, LLMProviderOptions } from './types';
import { AnthropicProvider } from './anthropic';
import { OpenAIProvider } from './openai';
import { GeminiProvider } from './gemini';

export type {
  LLMProvider,
  LLMProviderName,
  LLMProviderOptions,
  LLMCompletionRequest,
  LLMCompletionResponse,
} from './types';
export { AnthropicProvider, OpenAIProvider, GeminiProvider };

// ── Factory ─────────────────────────────────────────────────────────────────

const PROVIDERS: Record<LLMProviderName, new (options?: LLMProviderOptions) => LLMProvider> = {
  anthropic: AnthropicProvider,
  openai: OpenAIProvider,
  gemini: GeminiProvider,
};

function isProviderName(value: string): value is LLMProviderName {
  return Object.prototype.hasOwnProperty.call(PROVIDERS, value);
}

const API_KEY_ENV: Record<LLMProviderName, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
  gemini: 'GOOGLE_API_KEY',
};

/** Whether the provider will find an API key (explicit, LLM_API_KEY or its own variable). */
export function hasApiKey(name: LLMProviderName, apiKey?: string, env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(apiKey || env.LLM_API_KEY || env[API_KEY_ENV[name]]);
}

/** Build a provider with explicit options (configuration-driven wiring). */
export function createLLMProvider(name: LLMProviderName, options: LLMProviderOptions = {}): LLMProvider {
  return new PROVIDERS[name](options);
}

let cachedProvider: LLMProvider | null = null;
let cachedProviderName: string | null = null;

/**
 * Return the configured LLM provider singleton.
 * The provider is lazily initialised on first call and cached.
 * Changing LLM_PROVIDER at runtime requires calling `resetProvider()`.
 */
export function getLLMProvider(): LLMProvider {
  const providerName = process.env.LLM_PROVIDER || 'anthropic';

  if (cachedProvider && cachedProviderName === providerName) {
    return cachedProvider;
  }

  if (!isProviderName(providerName)) {
    throw new Error(
      `Unsupported LLM_PROVIDER: "${providerName}". ` +
      'Supported values: anthropic, openai, gemini',
    );
  }

  cachedProvider = createLLMProvider(providerName);
  cachedProviderName = providerName;
  return cachedProvider;
}

/** Reset the cached provider (useful for testing or runtime reconfiguration). */
export function resetProvider(): void {
  cachedProvider = null;
  cachedProviderName = null;
}
