import { HttpLLMGateway, isRecord } from './http-gateway.js';
import type { HttpGatewayConfig } from './http-gateway.js';

export const OLLAMA_DEFAULT_BASE_URL = 'http://localhost:11434';
export const OLLAMA_DEFAULT_MODEL = 'llama3.1:8b';

/**
 * Ollama local server, non-streaming `/api/generate`.
 */
export class OllamaGateway extends HttpLLMGateway {
  constructor(config: Partial<HttpGatewayConfig> = {}) {
    super({
      ...config,
      baseUrl: config.baseUrl ?? OLLAMA_DEFAULT_BASE_URL,
      model: config.model ?? OLLAMA_DEFAULT_MODEL,
    });
  }

  getName(): string {
    return 'ollama';
  }

  protected endpoint(): string {
    return '/api/generate';
  }

  protected buildBody(prompt: string): Record<string, unknown> {
    return { model: this.model, prompt, stream: false };
  }

  protected extractText(payload: unknown): string | null {
    if (isRecord(payload) && typeof payload.response === 'string') {
      return payload.response;
    }
    return null;
  }
}
