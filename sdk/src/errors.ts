export interface RateLimitInfo {
  limit?: number;
  remaining?: number;
  reset?: number;
  retryAfter?: number;
}

export interface CompanionErrorContext {
  status: number;
  code: string;
  details?: unknown;
  headers?: Record<string, string>;
  rateLimit?: RateLimitInfo;
}

export class CompanionError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: unknown;
  readonly headers: Record<string, string>;
  readonly rateLimit?: RateLimitInfo;

  constructor(message: string, context: CompanionErrorContext) {
    super(message);
    this.name = 'CompanionError';
    this.status = context.status;
    this.code = context.code;
    this.details = context.details;
    this.headers = context.headers ?? {};
    this.rateLimit = context.rateLimit;
  }
}

export class CompanionValidationError extends CompanionError {
  constructor(message: string, context: CompanionErrorContext) {
    super(message, context);
    this.name = 'CompanionValidationError';
  }
}

export class CompanionNotFoundError extends CompanionError {
  constructor(message: string, context: CompanionErrorContext) {
    super(message, context);
    this.name = 'CompanionNotFoundError';
  }
}

export class CompanionRateLimitError extends CompanionError {
  constructor(message: string, context: CompanionErrorContext) {
    super(message, context);
    this.name = 'CompanionRateLimitError';
  }
}

export class CompanionServerError extends CompanionError {
  constructor(message: string, context: CompanionErrorContext) {
    super(message, context);
    this.name = 'CompanionServerError';
  }
}

/**
 * The socket closed, or could not be opened, before a reply arrived.
 */
export class CompanionConnectionError extends CompanionError {
  constructor(message: string, context: Partial<CompanionErrorContext> = {}) {
    super(message, { status: 0, code: 'CONNECTION_CLOSED', ...context });
    this.name = 'CompanionConnectionError';
  }
}

const VALIDATION_STATUSES = new Set([400, 413, 415, 422]);

export function createCompanionError(
  message: string,
  context: CompanionErrorContext,
): CompanionError {
  if (context.status === 429 || context.code === 'RATE_LIMIT_EXCEEDED') {
    return new CompanionRateLimitError(message, context);
  }

  if (VALIDATION_STATUSES.has(context.status)) {
    return new CompanionValidationError(message, context);
  }

  if (context.status === 404) {
    return new CompanionNotFoundError(message, context);
  }

  if (context.status >= 500) {
    return new CompanionServerError(message, context);
  }

  return new CompanionError(message, context);
}
