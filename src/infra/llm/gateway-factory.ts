import type { RecollectRuntimeConfig } from '../config/runtime-config.js';
import type { BaseLLMGateway, LLMLogSink } from './llm-gateway.js';
import { OllamaGateway } from './ollama-gateway.js';
import { OpenAIGateway } from './openai-gateway.js';
import { StubLLMGateway } from './stub-gateway.js';

/**
 * Builds the gateway named by `llm.provider`. Empty `baseUrl` and `model`
 * fall through to the provider defaults.
 */
export function createGateway(llm: RecollectRuntimeConfig['llm'], logSink?: LLMLogSink): BaseLLMGateway {
  const common = {
    logSink,
    baseUrl: llm.baseUrl || undefined,
    model: llm.model || undefined,
    apiKey: llm.apiKey,
    timeoutMs: llm.timeoutMs,
  };

  switch (llm.provider) {
    case 'ollama':
      return new OllamaGateway(common);
    case 'openai':
      return new OpenAIGateway(common);
    case 'stub':
      return new StubLLMGateway({ logSink });
  }
}
