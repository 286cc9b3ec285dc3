export type ToolErrorKind =
  | 'transport_error'
  | 'malformed_response'
  | 'task_failed'
  | 'protocol_error'
  | 'not_initialized'
  | 'invalid_parameters'
  | 'middleware_error';

export interface ToolErrorMeaning {
  retryable: boolean;
  summary: string;
}

export const TOOL_ERROR_KIND_MEANINGS: Record<ToolErrorKind, ToolErrorMeaning> = {
  transport_error: {
    retryable: true,
    summary: 'Network or transport failure while talking to the provider.',
  },
  malformed_response: {
    retryable: false,
    summary: 'Provider answered with a payload that could not be parsed.',
  },
  task_failed: {
    retryable: false,
    summary: 'Provider reported that the task or tool call failed.',
  },
  protocol_error: {
    retryable: false,
    summary: 'Provider rejected the request with a protocol-level error.',
  },
  not_initialized: {
    retryable: false,
    summary: 'Client used before connect() completed.',
  },
  invalid_parameters: {
    retryable: false,
    summary: 'Arguments failed schema validation before invocation.',
  },
  middleware_error: {
    retryable: false,
    summary: 'A call middleware step failed before the request was sent.',
  },
};

interface ToolRelayErrorOptions {
  provider?: string;
  code?: string | number;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ToolRelayError extends Error {
  readonly kind: ToolErrorKind;
  readonly provider?: string;
  readonly code?: string | number;
  readonly details?: Record<string, unknown>;

  constructor(kind: ToolErrorKind, message: string, opts?: ToolRelayErrorOptions) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'ToolRelayError';
    this.kind = kind;
    if (opts?.provider !== undefined) {
      this.provider = opts.provider;
    }
    if (opts?.code !== undefined) {
      this.code = opts.code;
    }
    if (opts?.details !== undefined) {
      this.details = opts.details;
    }
  }
}

export class ConnectionError extends ToolRelayError {
  constructor(message: string, opts?: ToolRelayErrorOptions, kind: 'transport_error' | 'malformed_response' = 'transport_error') {
    super(kind, message, opts);
    this.name = 'ConnectionError';
  }
}

// Connection-level, but retrying would only reproduce the same payload
export class MalformedResponseError extends ConnectionError {
  constructor(message: string, opts?: ToolRelayErrorOptions) {
    super(message, opts, 'malformed_response');
    this.name = 'MalformedResponseError';
  }
}

export class TaskError extends ToolRelayError {
  constructor(message: string, opts?: ToolRelayErrorOptions, kind: 'task_failed' | 'protocol_error' = 'task_failed') {
    super(kind, message, opts);
    this.name = 'TaskError';
  }
}

export class NotInitializedError extends ToolRelayError {
  constructor(provider: string) {
    super('not_initialized', `Server '${provider}' not initialized. Make sure you call connect() first.`, { provider });
    this.name = 'NotInitializedError';
  }
}

export class InvalidParametersError extends ToolRelayError {
  constructor(message: string, opts?: ToolRelayErrorOptions) {
    super('invalid_parameters', message, opts);
    this.name = 'InvalidParametersError';
  }
}

export class MiddlewareError extends ToolRelayError {
  constructor(message: string, opts?: ToolRelayErrorOptions) {
    super('middleware_error', message, opts);
    this.name = 'MiddlewareError';
  }
}

export const isToolRelayError = (value: unknown): value is ToolRelayError =>
  value instanceof ToolRelayError;

export const isRetryableError = (value: unknown): boolean =>
  isToolRelayError(value) && TOOL_ERROR_KIND_MEANINGS[value.kind].retryable;

const normalizeErrorMessage = (value: unknown): string => {
  if (value instanceof Error && typeof value.message === 'string') return value.message;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return value.toString();
  }
  if (value === null) return 'null';
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return '[unserializable-error]';
    }
  }
  return 'unknown_error';
};

export const toToolRelayError = (
  value: unknown,
  fallbackKind: ToolErrorKind = 'transport_error'
): ToolRelayError => {
  if (isToolRelayError(value)) return value;
  return new ToolRelayError(fallbackKind, normalizeErrorMessage(value), { cause: value });
};
