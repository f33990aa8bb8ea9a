export { createAssistant } from './app/bootstrap.js';
export type { Assistant, CreateAssistantOptions } from './app/bootstrap.js';
export { TurnPipeline } from './app/conversation/turn-pipeline.js';
export type { ITurnPipeline, StatusSink, TurnPipelineOptions } from './app/conversation/turn-pipeline.js';
export { TranslationService } from './app/translation/translation-service.js';
export type { TranslationLanguages } from './app/translation/translation-service.js';

export { StepStatus } from './domain/conversation/turn.js';
export type * from './domain/conversation/turn.js';
export type * from './domain/attribute/types.js';
export type * from './domain/audit/types.js';
export * from './domain/errors.js';
export { LANGUAGES, buildAnswerVocabulary } from './domain/conversation/language.js';
export type { LanguageCode, IAnswerVocabulary } from './domain/conversation/language.js';

export {
  BaseLLMGateway,
  LLMGatewayError,
  GatewayConnectivityError,
  GatewayPayloadError,
} from './infra/llm/llm-gateway.js';
export type { ILLMGateway, GenerateResult, LLMInteraction, LLMLogSink } from './infra/llm/llm-gateway.js';
export { judgeWith, extractWith, generateReplyWith } from './infra/llm/gateway-behaviors.js';
export { StubLLMGateway } from './infra/llm/stub-gateway.js';
export { OllamaGateway } from './infra/llm/ollama-gateway.js';
export { OpenAIGateway } from './infra/llm/openai-gateway.js';
export { createGateway } from './infra/llm/gateway-factory.js';

export { SqliteAttributeRepository, seedDefaultDefinitions } from './infra/persistence/attribute-repository.js';
export { LLMLogRepository } from './infra/persistence/llm-log-repository.js';
export { LLMAuditLogger } from './infra/audit/llm-audit-logger.js';
export { loadRuntimeConfig } from './infra/config/runtime-config.js';
export type { RecollectRuntimeConfig } from './infra/config/runtime-config.js';

export { debug, debugEmitter } from './debug/index.js';
