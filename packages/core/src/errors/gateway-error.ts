/**
 * Error type for directory and access gateways
 */

export type GatewayErrorCode =
  | 'CONNECTION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'PERMISSION_DENIED'
  | 'NOT_FOUND'
  | 'RATE_LIMITED'
  | 'TIMEOUT'
  | 'INVALID_RESPONSE'
  | 'READ_FAILED'
  | 'WRITE_FAILED'
  | 'CIRCUIT_OPEN'
  | 'CONFIGURATION_ERROR'
  | 'UNKNOWN';

export interface GatewayErrorDetails {
  /** Error code for programmatic handling */
  code: GatewayErrorCode;
  /** Human-readable message */
  message: string;
  /** Gateway that raised the error (okta, gitlab, ...) */
  gatewayId?: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class GatewayError extends Error {
  readonly code: GatewayErrorCode;
  readonly gatewayId?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: GatewayErrorDetails) {
    super(details.message);
    this.name = 'GatewayError';
    this.code = details.code;
    this.gatewayId = details.gatewayId;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    Error.captureStackTrace(this, GatewayError);
  }

  /**
   * Format error for operators
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.gatewayId) {
      parts.push(`Gateway: ${this.gatewayId}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      gatewayId: this.gatewayId,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Helper to wrap unknown errors as GatewayError
 */
export function wrapError(
  error: unknown,
  gatewayId?: string,
  defaultCode: GatewayErrorCode = 'UNKNOWN'
): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new GatewayError({
    code: defaultCode,
    message,
    gatewayId,
    cause,
  });
}
