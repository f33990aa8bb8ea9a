import { HttpLLMGateway, isRecord } from './http-gateway.js';
import type { HttpGatewayConfig } from './http-gateway.js';

export const OPENAI_DEFAULT_BASE_URL = 'https://api.openai.com';
export const OPENAI_DEFAULT_MODEL = 'gpt-4o-mini';

/**
 * OpenAI-compatible chat completions endpoint. The prompt is sent as a
 * single user message.
 */
export class OpenAIGateway extends HttpLLMGateway {
  constructor(config: Partial<HttpGatewayConfig> = {}) {
    super({
      ...config,
      baseUrl: config.baseUrl ?? OPENAI_DEFAULT_BASE_URL,
      model: config.model ?? OPENAI_DEFAULT_MODEL,
    });
  }

  getName(): string {
    return 'openai';
  }

  protected endpoint(): string {
    return '/v1/chat/completions';
  }

  protected headers(): Record<string, string> {
    const headers = super.headers();
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }
    return headers;
  }

  protected buildBody(prompt: string): Record<string, unknown> {
    return {
      model: this.model,
      messages: [{ role: 'user', content: prompt }],
    };
  }

  protected extractText(payload: unknown): string | null {
    if (!isRecord(payload) || !Array.isArray(payload.choices)) {
      return null;
    }
    const first: unknown = payload.choices[0];
    if (!isRecord(first) || !isRecord(first.message)) {
      return null;
    }
    const content = first.message.content;
    return typeof content === 'string' ? content : null;
  }
}
