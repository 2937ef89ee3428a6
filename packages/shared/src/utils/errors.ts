export class MedGraphError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'MedGraphError';
  }
}

/** A matcher or remote service is not configured; callers degrade instead of failing. */
export class CapabilityUnavailableError extends MedGraphError {
  constructor(
    message: string,
    public readonly capability: string,
  ) {
    super(message, 'CAPABILITY_UNAVAILABLE');
    this.name = 'CapabilityUnavailableError';
  }
}

export class AuthenticationError extends MedGraphError {
  constructor(message: string, cause?: Error) {
    super(message, 'AUTHENTICATION_FAILED', cause);
    this.name = 'AuthenticationError';
  }
}

export class TransientRemoteError extends MedGraphError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(message, 'TRANSIENT_REMOTE_FAILURE', cause);
    this.name = 'TransientRemoteError';
  }
}

export class ConnectionClosedError extends MedGraphError {
  constructor(message = 'Graph connection is closed') {
    super(message, 'CONNECTION_CLOSED');
    this.name = 'ConnectionClosedError';
  }
}

export class SearchDegradedError extends MedGraphError {
  constructor(
    message: string,
    public readonly searchKind: 'facts' | 'entities',
    cause?: Error,
  ) {
    super(message, 'SEARCH_DEGRADED', cause);
    this.name = 'SearchDegradedError';
  }
}

export class OperationCancelledError extends MedGraphError {
  constructor(message = 'Operation was cancelled', cause?: Error) {
    super(message, 'OPERATION_CANCELLED', cause);
    this.name = 'OperationCancelledError';
  }
}

export class LlmError extends MedGraphError {
  constructor(
    message: string,
    public readonly retryable: boolean,
    cause?: Error,
  ) {
    super(message, 'LLM_ERROR', cause);
    this.name = 'LlmError';
  }
}

export class PersistenceError extends MedGraphError {
  constructor(message: string, cause?: Error) {
    super(message, 'PERSISTENCE_ERROR', cause);
    this.name = 'PersistenceError';
  }
}

export class SchemaValidationError extends MedGraphError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends MedGraphError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

/**
 * Errors that end the current scope. Batch loops must let these through instead of
 * counting them as per-item failures.
 */
export function isScopeTerminatingError(error: unknown): boolean {
  return (
    error instanceof AuthenticationError ||
    error instanceof ConnectionClosedError ||
    error instanceof OperationCancelledError
  );
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
