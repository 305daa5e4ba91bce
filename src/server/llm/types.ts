/**
 * LLM Provider abstraction.
 *
 * Defines a provider-agnostic interface so the query generator
 * can work with any LLM backend (Anthropic, OpenAI, Google Gemini).
 */

export interface LLMCompletionRequest {
  /** System prompt providing context and instructions. */
  system: string;
  /** The user's message / question. */
  userMessage: string;
  /** Maximum tokens in the response. */
  maxTokens?: number;
  /** Sampling temperature; generation uses 0 for repeatable output. */
  temperature?: number;
  /** Aborts the HTTP request to the provider. */
  signal?: AbortSignal;
}

export interface LLMCompletionResponse {
  /** The text content returned by the model. */
  text: string;
  /** Provider-specific model identifier that was used. */
  model: string;
  /** Token usage stats (when available from the provider). */
  usage?: {
    inputTokens?: number;
    outputTokens?: number;
  };
}

/**
 * All LLM providers must implement this interface.
 */
export interface LLMProvider {
  /** Human-readable provider name (e.g. "anthropic", "openai", "gemini"). */
  readonly name: string;

  /**
   * Send a completion request and return the model's text response.
   * Throws on network / auth / rate-limit errors and when aborted.
   */
  complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse>;
}

/** Supported provider identifiers. */
export type LLMProviderName = 'anthropic' | 'openai' | 'gemini';

/** Credentials and model override; unset fields fall back to environment variables. */
export interface LLMProviderOptions {
  apiKey?: string;
  model?: string;
}
