import type { LLMProvider, LLMProviderOptions, LLMCompletionRequest, LLMCompletionResponse } from './types';
import { DEFAULT_LLM_MAX_TOKENS } from '../../shared/constants';

const DEFAULT_MODEL = 'gpt-4o';

export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai' as const;
  private client: import('openai').default | null = null;

  constructor(private readonly options: LLMProviderOptions = {}) {}

  private async getClient() {
    if (!this.client) {
      const { default: OpenAI } = await import('openai');
      this.client = new OpenAI({
        apiKey: this.options.apiKey || process.env.LLM_API_KEY || process.env.OPENAI_API_KEY,
        maxRetries: 0,
      });
    }
    return this.client;
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const client = await this.getClient();
    const model = this.options.model || process.env.LLM_MODEL || DEFAULT_MODEL;

    const response = await client.chat.completions.create(
      {
        model,
        max_tokens: request.maxTokens ?? DEFAULT_LLM_MAX_TOKENS,
        temperature: request.temperature,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.userMessage },
        ],
      },
      { signal: request.signal },
    );

    const text = response.choices[0]?.message?.content;
    if (!text) {
      throw new Error('No text response received from OpenAI');
    }

    return {
      text,
      model,
      usage: {
        inputTokens: response.usage?.prompt_tokens,
        outputTokens: response.usage?.completion_tokens,
      },
    };
  }
}
