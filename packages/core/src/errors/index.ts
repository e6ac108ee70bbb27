/**
 * Stable, machine-readable failure codes. The transport layer maps these to
 * wire statuses; they never change between releases.
 */
export const ErrorCode = {
  ENGINE_CONNECTIVITY: 'ENGINE_CONNECTIVITY',
  QUERY_TIMEOUT: 'QUERY_TIMEOUT',
  QUERY_EXECUTION: 'QUERY_EXECUTION',
  ROW_MAPPING: 'ROW_MAPPING',
  INTERCEPTOR_REJECTED: 'INTERCEPTOR_REJECTED',
  INVALID_PAGINATION: 'INVALID_PAGINATION',
  UNKNOWN_PRIORITY_SOURCE: 'UNKNOWN_PRIORITY_SOURCE',
  INVALID_FILTERS: 'INVALID_FILTERS',
  INVALID_QUERY: 'INVALID_QUERY',
  REQUEST_CANCELLED: 'REQUEST_CANCELLED',
  CONFIGURATION: 'CONFIGURATION',
  INTERNAL: 'INTERNAL',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class RowmuxError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public override cause?: Error,
  ) {
    super(message);
    this.name = 'RowmuxError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class EngineConnectivityError extends RowmuxError {
  constructor(
    message: string,
    public readonly engine?: string,
    cause?: Error,
    code: ErrorCode = ErrorCode.ENGINE_CONNECTIVITY,
  ) {
    super(message, code, cause);
    this.name = 'EngineConnectivityError';
  }
}

export class QueryTimeoutError extends EngineConnectivityError {
  constructor(
    message: string,
    public readonly timeout?: number,
    engine?: string,
  ) {
    super(message, engine, undefined, ErrorCode.QUERY_TIMEOUT);
    this.name = 'QueryTimeoutError';
  }
}

export class QueryExecutionError extends RowmuxError {
  constructor(
    message: string,
    public readonly sql?: string,
    public readonly params?: readonly unknown[],
    cause?: Error,
  ) {
    super(message, ErrorCode.QUERY_EXECUTION, cause);
    this.name = 'QueryExecutionError';
  }
}

export class RowMappingError extends RowmuxError {
  constructor(
    message: string,
    public readonly sourceId: string,
    public readonly rowIndex: number,
    public readonly issues: readonly string[] = [],
    cause?: Error,
  ) {
    super(message, ErrorCode.ROW_MAPPING, cause);
    this.name = 'RowMappingError';
  }
}

/**
 * Thrown by an interceptor that deliberately stops the chain. `status` and
 * `reason` reach the transport layer untouched.
 */
export class InterceptorRejectedError extends RowmuxError {
  constructor(
    public readonly status: number,
    public readonly reason: string,
  ) {
    super(reason, ErrorCode.INTERCEPTOR_REJECTED);
    this.name = 'InterceptorRejectedError';
  }
}

export class InvalidPaginationError extends RowmuxError {
  constructor(
    message: string,
    public readonly field: 'limit' | 'offset',
  ) {
    super(message, ErrorCode.INVALID_PAGINATION);
    this.name = 'InvalidPaginationError';
  }
}

export class UnknownPrioritySourceError extends RowmuxError {
  constructor(public readonly sourceId: string) {
    super(`Unknown source in priority override: "${sourceId}"`, ErrorCode.UNKNOWN_PRIORITY_SOURCE);
    this.name = 'UnknownPrioritySourceError';
  }
}

export class InvalidFiltersError extends RowmuxError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    cause?: Error,
  ) {
    super(message, ErrorCode.INVALID_FILTERS, cause);
    this.name = 'InvalidFiltersError';
  }
}

export class InvalidQueryError extends RowmuxError {
  constructor(message: string, cause?: Error) {
    super(message, ErrorCode.INVALID_QUERY, cause);
    this.name = 'InvalidQueryError';
  }
}

export class RequestCancelledError extends RowmuxError {
  constructor(message = 'Request was cancelled') {
    super(message, ErrorCode.REQUEST_CANCELLED);
    this.name = 'RequestCancelledError';
  }
}

export class ConfigurationError extends RowmuxError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message, ErrorCode.CONFIGURATION);
    this.name = 'ConfigurationError';
  }
}

export class InternalError extends RowmuxError {
  constructor(message: string, cause?: Error) {
    super(message, ErrorCode.INTERNAL, cause);
    this.name = 'InternalError';
  }
}

export interface ErrorResponse {
  code: ErrorCode;
  message: string;
  status?: number;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Normalize anything thrown at the handler boundary into a RowmuxError.
 */
export function toRowmuxError(value: unknown): RowmuxError {
  if (value instanceof RowmuxError) {
    return value;
  }
  const error = toError(value);
  return new InternalError(error.message, error);
}

export function toErrorResponse(value: unknown): ErrorResponse {
  const error = toRowmuxError(value);
  const response: ErrorResponse = { code: error.code, message: error.message };
  if (error instanceof InterceptorRejectedError) {
    response.status = error.status;
  }
  return response;
}
