// ═══════════════════════════════════════════════════════════
// TERMSAGE — Errors
// Everything that can abort a query, with a stable code
// ═══════════════════════════════════════════════════════════

export type TermsageErrorCode =
  | 'TRANSPORT_TIMEOUT'
  | 'TRANSPORT_CONNECTION_FAILED'
  | 'BACKEND_ERROR'
  | 'EMPTY_OUTPUT'
  | 'MODEL_UNAVAILABLE'
  | 'CONFIG_ERROR'
  | 'RULE_TABLE_ERROR'
  | 'HISTORY_ERROR';

/** Base class for every error termsage raises on purpose */
export class TermsageError extends Error {
  readonly code: TermsageErrorCode;

  constructor(code: TermsageErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export type TransportErrorKind = 'timeout' | 'connection_failed';

/** The model server could not be reached in time. Retry by re-running. */
export class TransportError extends TermsageError {
  readonly kind: TransportErrorKind;

  constructor(kind: TransportErrorKind, message: string, options?: { cause?: unknown }) {
    super(kind === 'timeout' ? 'TRANSPORT_TIMEOUT' : 'TRANSPORT_CONNECTION_FAILED', message, options);
    this.kind = kind;
  }
}

/** The model server answered, but reported a failure */
export class BackendError extends TermsageError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super('BACKEND_ERROR', message);
    this.status = status;
  }
}

/** The model produced nothing usable */
export class EmptyOutputError extends TermsageError {
  constructor(message = 'Empty response from the model') {
    super('EMPTY_OUTPUT', message);
  }
}

export class ModelUnavailableError extends TermsageError {
  readonly model: string;
  readonly available: string[];

  constructor(model: string, available: string[]) {
    super('MODEL_UNAVAILABLE', `Model '${model}' is not available`);
    this.model = model;
    this.available = available;
  }
}

export class ConfigError extends TermsageError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
  }
}

export class RuleTableError extends TermsageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RULE_TABLE_ERROR', message, options);
  }
}

export class HistoryError extends TermsageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('HISTORY_ERROR', message, options);
  }
}

/** Errors that come out of the model client */
export type ModelClientError = TransportError | BackendError | EmptyOutputError;

export function isModelClientError(error: unknown): error is ModelClientError {
  return error instanceof TransportError
    || error instanceof BackendError
    || error instanceof EmptyOutputError;
}

/** One-line, user-facing description of any thrown value */
export function describeError(error: unknown): string {
  if (error instanceof TransportError) {
    return error.kind === 'timeout'
      ? `Request timed out. ${error.message}`
      : `Connection failed. ${error.message}`;
  }
  if (error instanceof BackendError) {
    return `Model server error: ${error.message}`;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}
