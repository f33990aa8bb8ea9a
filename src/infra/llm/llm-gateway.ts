import { randomUUID } from 'node:crypto';

import type { LLMTaskKind } from '../../domain/audit/types.js';
import type { IHistoryEntry } from '../../domain/conversation/turn.js';
import { ErrorCodes, RecollectError } from '../../domain/errors.js';
import type { ErrorCode } from '../../domain/errors.js';
import { debug } from '../../debug/index.js';

export type { LLMTaskKind } from '../../domain/audit/types.js';

export interface GenerateResult {
  text: string;
  /** Decoded backend payload, kept for auditing */
  raw?: unknown;
}

export interface LLMInteraction {
  model: string;
  taskKind: LLMTaskKind;
  attributeName?: string;
  prompt: string;
  text: string;
  raw?: unknown;
  sentAt: number;
  receivedAt: number;
}

/**
 * Observability hook invoked after every successful `generate` call.
 */
export type LLMLogSink = (interaction: LLMInteraction) => void;

/**
 * Capability set of a language model backend. Only `generate` is required;
 * `judge`, `extract` and `generateReply` fall back to the template behaviors
 * in gateway-behaviors.ts when a gateway does not provide its own.
 */
export interface ILLMGateway {
  generate(prompt: string, taskKind: LLMTaskKind, attributeName?: string): Promise<GenerateResult>;
  getName(): string;

  judge?(question: string, input: string, attributeName?: string): Promise<boolean>;
  extract?(instruction: string, input: string, attributeName?: string): Promise<string | null>;
  generateReply?(window: IHistoryEntry[], input: string, attributes: Record<string, string>): Promise<string>;
}

// ============================================================================
// Errors
// ============================================================================

export class LLMGatewayError extends RecollectError {
  constructor(
    code: ErrorCode,
    message: string,
    public gateway: string,
    public recoverable: boolean = true,
    options?: { cause?: unknown }
  ) {
    super(code, message, options);
    this.name = 'LLMGatewayError';
  }
}

/** Backend unreachable, timed out, or answered with a non-success status */
export class GatewayConnectivityError extends LLMGatewayError {
  constructor(message: string, gateway: string, public status?: number, options?: { cause?: unknown }) {
    super(ErrorCodes.GATEWAY_CONNECTIVITY, message, gateway, status === undefined || status >= 500, options);
    this.name = 'GatewayConnectivityError';
  }
}

/** Backend answered, but the payload could not be decoded */
export class GatewayPayloadError extends LLMGatewayError {
  constructor(message: string, gateway: string, options?: { cause?: unknown }) {
    super(ErrorCodes.GATEWAY_PAYLOAD, message, gateway, false, options);
    this.name = 'GatewayPayloadError';
  }
}

// ============================================================================
// Base Gateway
// ============================================================================

export interface BaseGatewayOptions {
  logSink?: LLMLogSink;
}

/**
 * Shared `generate` plumbing: debug events and the log sink. Concrete
 * gateways implement `send`.
 */
export abstract class BaseLLMGateway implements ILLMGateway {
  private logSink?: LLMLogSink;

  constructor(options: BaseGatewayOptions = {}) {
    this.logSink = options.logSink;
  }

  abstract getName(): string;

  /** Model identifier recorded in the audit log */
  abstract readonly model: string;

  protected abstract send(prompt: string, taskKind: LLMTaskKind, attributeName?: string): Promise<GenerateResult>;

  setLogSink(sink: LLMLogSink | undefined): void {
    this.logSink = sink;
  }

  async generate(prompt: string, taskKind: LLMTaskKind, attributeName?: string): Promise<GenerateResult> {
    const requestId = randomUUID();
    const sentAt = Date.now();
    debug.llmRequest(requestId, this.model, taskKind, prompt, attributeName);

    let result: GenerateResult;
    try {
      result = await this.send(prompt, taskKind, attributeName);
    } catch (error) {
      debug.llmError(requestId, this.model, error);
      throw error;
    }

    const receivedAt = Date.now();
    debug.llmResponse(requestId, this.model, result.text, receivedAt - sentAt);

    this.report({
      model: this.model,
      taskKind,
      attributeName,
      prompt,
      text: result.text,
      raw: result.raw,
      sentAt,
      receivedAt,
    });

    return result;
  }

  private report(interaction: LLMInteraction): void {
    if (!this.logSink) return;
    try {
      this.logSink(interaction);
    } catch (error) {
      // Sink failures never change the outcome of generate.
      debug.systemError('llm-log-sink', error);
      console.warn(`[${this.getName()}] LLM log sink failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
