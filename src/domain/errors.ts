/**
 * Error Codes and Classes
 *
 * Every error raised by the assistant core carries a stable string code so
 * that the outer layer (CLI, or any HTTP front end) can map it to a user
 * facing message without inspecting class hierarchies.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCodes = {
  VALIDATION_FAILED: 'validation_failed',
  GATEWAY_CONNECTIVITY: 'gateway_connectivity',
  GATEWAY_PAYLOAD: 'gateway_payload',
  STORE_FAILURE: 'store_failure',
  CONFIG_INVALID: 'config_invalid',
  INVALID_STATE_TRANSITION: 'invalid_state_transition',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCodes.VALIDATION_FAILED]: 'Validation failed',
  [ErrorCodes.GATEWAY_CONNECTIVITY]: 'Language model backend unreachable',
  [ErrorCodes.GATEWAY_PAYLOAD]: 'Language model backend returned an unreadable payload',
  [ErrorCodes.STORE_FAILURE]: 'Attribute store failure',
  [ErrorCodes.CONFIG_INVALID]: 'Invalid configuration',
  [ErrorCodes.INVALID_STATE_TRANSITION]: 'Invalid state transition',
};

// ============================================================================
// Base Class
// ============================================================================

export class RecollectError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message || ErrorMessages[code], options);
    this.name = 'RecollectError';
    this.code = code;
  }
}

// ============================================================================
// Domain Errors
// ============================================================================

export interface FieldViolation {
  field: string;
  message: string;
}

export class ValidationError extends RecollectError {
  readonly violations: FieldViolation[];

  constructor(violations: FieldViolation[]) {
    super(
      ErrorCodes.VALIDATION_FAILED,
      `Validation failed: ${violations.map(v => `${v.field}: ${v.message}`).join('; ')}`
    );
    this.name = 'ValidationError';
    this.violations = violations;
  }
}

export class StoreError extends RecollectError {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(ErrorCodes.STORE_FAILURE, `Attribute store failure during ${operation}: ${detail}`, { cause });
    this.name = 'StoreError';
  }
}

export class ConfigError extends RecollectError {
  constructor(message: string, readonly errors: Array<{ path: string; message: string }> = []) {
    super(ErrorCodes.CONFIG_INVALID, message);
    this.name = 'ConfigError';
  }
}

export class InvalidStateTransitionError extends RecollectError {
  constructor(from: string, to: string) {
    super(ErrorCodes.INVALID_STATE_TRANSITION, `Invalid state transition: ${from} -> ${to}`);
    this.name = 'InvalidStateTransitionError';
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

export function isRecollectError(error: unknown): error is RecollectError {
  return error instanceof RecollectError;
}
