import type { ILLMLogRepository } from '../../domain/audit/types.js';
import type { LLMInteraction, LLMLogSink } from '../llm/llm-gateway.js';

/**
 * Persists every gateway interaction to the LLM log.
 */
export class LLMAuditLogger {
  constructor(private repository: ILLMLogRepository) {}

  record(interaction: LLMInteraction): void {
    this.repository.insert({
      model: interaction.model,
      taskKind: interaction.taskKind,
      prompt: interaction.prompt,
      response: interaction.text,
      rawResponse: interaction.raw === undefined ? undefined : JSON.stringify(interaction.raw),
      attributeName: interaction.attributeName,
      sentAt: interaction.sentAt,
      receivedAt: interaction.receivedAt,
    });
  }

  /** Bound `record`, ready to hand to a gateway */
  asSink(): LLMLogSink {
    return interaction => this.record(interaction);
  }
}
