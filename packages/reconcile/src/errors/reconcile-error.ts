/**
 * Reconciliation Error Types
 */

export type ReconcileErrorCode = 'INVALID_OPTIONS';

export interface ReconcileErrorDetails {
  code: ReconcileErrorCode;
  message: string;
  suggestion?: string;
  context?: Record<string, unknown>;
}

export class ReconcileError extends Error {
  readonly code: ReconcileErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ReconcileErrorDetails) {
    super(details.message);
    this.name = 'ReconcileError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;
  }

  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
  }
}
