// Standardized error handling utilities
// HTTP-facing AppError envelope plus the agent error taxonomy used inside the reasoning loop

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  BAD_REQUEST = 'bad_request',
  CONFLICT = 'conflict',
  INTERNAL_ERROR = 'internal_error',
  SERVICE_UNAVAILABLE = 'service_unavailable',
  VALIDATION_ERROR = 'validation_error',
  CLIENT_CLOSED = 'client_closed',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static notFound(message: string = 'Resource not found', details?: unknown): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404, details);
  }

  static conflict(message: string = 'Conflict', details?: unknown): AppError {
    return new AppError(ErrorCode.CONFLICT, message, 409, details);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static serviceUnavailable(message: string = 'Service unavailable', details?: unknown): AppError {
    return new AppError(ErrorCode.SERVICE_UNAVAILABLE, message, 503, details);
  }

  /** The client went away before the turn finished (nginx-style 499) */
  static clientClosed(message: string = 'Client closed the request'): AppError {
    return new AppError(ErrorCode.CLIENT_CLOSED, message, 499);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (includeDetails && error.details) {
    response.details = error.details;
  }

  return response;
}

// ---------------------------------------------------------------------------
// Agent errors
// ---------------------------------------------------------------------------

export type AgentErrorCode =
  | 'schema_validation'
  | 'query_error'
  | 'retrieval_error'
  | 'timeout'
  | 'tool_error'
  | 'format_error'
  | 'loop_bound_exceeded'
  | 'collaborator_unavailable'
  | 'aborted';

/**
 * Base class for everything the reasoning loop can raise.
 * `recoverable` errors are turned into failed observations; the rest end the turn.
 */
export class AgentError extends Error {
  constructor(
    public readonly code: AgentErrorCode,
    message: string,
    public readonly recoverable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AgentError';
  }
}

/** Tool arguments did not match the tool's input schema, or the tool is unknown */
export class SchemaValidationError extends AgentError {
  constructor(message: string, public readonly issues: string[] = []) {
    super('schema_validation', message, true);
    this.name = 'SchemaValidationError';
  }
}

/** The relational store rejected or could not build a query */
export class QueryError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('query_error', message, true, options);
    this.name = 'QueryError';
  }
}

/** The vector index or the embedder could not serve a search */
export class RetrievalError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('retrieval_error', message, true, options);
    this.name = 'RetrievalError';
  }
}

export class ToolTimeoutError extends AgentError {
  constructor(tool: string, timeoutMs: number) {
    super('timeout', `Tool "${tool}" did not finish within ${timeoutMs}ms`, true);
    this.name = 'ToolTimeoutError';
  }
}

/** Any other failure raised inside a tool */
export class ToolExecutionError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('tool_error', message, true, options);
    this.name = 'ToolExecutionError';
  }
}

/** The reasoning model's reply could not be read as an action or a final answer */
export class FormatError extends AgentError {
  constructor(message: string, public readonly raw: string) {
    super('format_error', message, true);
    this.name = 'FormatError';
  }
}

export class LoopBoundExceeded extends AgentError {
  constructor(maxIterations: number) {
    super('loop_bound_exceeded', `Reached the limit of ${maxIterations} reasoning steps`, true);
    this.name = 'LoopBoundExceeded';
  }
}

/** The reasoning model could not be reached; fatal for the current turn only */
export class CollaboratorUnavailableError extends AgentError {
  constructor(collaborator: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super('collaborator_unavailable', `${collaborator} is unavailable${reason}`, false, options);
    this.name = 'CollaboratorUnavailableError';
  }
}

export class TurnAbortedError extends AgentError {
  constructor(message: string = 'Turn was aborted') {
    super('aborted', message, false);
    this.name = 'TurnAbortedError';
  }
}

/** Normalise anything thrown inside a tool into a recoverable AgentError */
export function toAgentError(error: unknown): AgentError {
  if (error instanceof AgentError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ToolExecutionError(message, { cause: error });
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'APIUserAbortError');
}
