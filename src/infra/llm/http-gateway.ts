import type { LLMTaskKind } from '../../domain/audit/types.js';
import { BaseLLMGateway, GatewayConnectivityError, GatewayPayloadError } from './llm-gateway.js';
import type { BaseGatewayOptions, GenerateResult } from './llm-gateway.js';

export const DEFAULT_TIMEOUT_MS = 60000;

export interface HttpGatewayConfig extends BaseGatewayOptions {
  baseUrl: string;
  model: string;
  apiKey?: string;
  timeoutMs?: number;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Single-completion JSON-over-HTTP backend. Subclasses describe the request
 * and pick the text out of the decoded body.
 */
export abstract class HttpLLMGateway extends BaseLLMGateway {
  readonly model: string;
  protected baseUrl: string;
  protected apiKey?: string;
  protected timeoutMs: number;

  constructor(config: HttpGatewayConfig) {
    super(config);
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.model = config.model;
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  protected abstract endpoint(): string;
  protected abstract buildBody(prompt: string): Record<string, unknown>;
  /** Returns null when the payload carries no text */
  protected abstract extractText(payload: unknown): string | null;

  protected headers(): Record<string, string> {
    return { 'Content-Type': 'application/json' };
  }

  protected async send(prompt: string, _taskKind: LLMTaskKind): Promise<GenerateResult> {
    const url = `${this.baseUrl}${this.endpoint()}`;
    const name = this.getName();

    // The timeout signal covers the body read as well as the request.
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify(this.buildBody(prompt)),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw this.connectivityFailure(error);
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new GatewayConnectivityError(
        `${name} API error: HTTP ${response.status} ${response.statusText}`,
        name,
        response.status
      );
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw this.connectivityFailure(error);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (error) {
      throw new GatewayPayloadError(`${name} returned a body that is not JSON`, name, { cause: error });
    }

    const text = this.extractText(payload);
    if (text === null) {
      throw new GatewayPayloadError(`${name} response has no completion text`, name);
    }

    return { text, raw: payload };
  }

  /** fetch errors may come from another realm, so they are read by shape */
  private connectivityFailure(error: unknown): GatewayConnectivityError {
    const name = this.getName();
    const errorName = isRecord(error) ? error.name : undefined;
    const message = isRecord(error) ? error.message : undefined;

    const reason = errorName === 'TimeoutError'
      ? `timed out after ${this.timeoutMs}ms`
      : typeof message === 'string' ? message : String(error);
    return new GatewayConnectivityError(`${name} request failed: ${reason}`, name, undefined, { cause: error });
  }
}
