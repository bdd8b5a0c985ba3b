export type ErrorCode =
  | 'INVALID_AVAILABILITY'
  | 'MALFORMED_HEADER'
  | 'NOT_ACCEPTABLE'
  | 'INTERNAL';

export interface ActionableErrorFields {
  statusCode: number;
  retryable: boolean;
  fixHint: string;
}

const ACTIONABLE_ERROR_DEFAULTS: Record<ErrorCode, ActionableErrorFields> = {
  INVALID_AVAILABILITY: {
    statusCode: 500,
    retryable: false,
    fixHint: 'Fix the server-side availability map: every weight must be a number in (0, 1] with at most 3 decimal places.'
  },
  MALFORMED_HEADER: {
    statusCode: 400,
    retryable: false,
    fixHint: 'Send a header of comma-separated tokens with optional ";q=<0..1>" parameters.'
  },
  NOT_ACCEPTABLE: {
    statusCode: 406,
    retryable: false,
    fixHint: 'Widen the header (for example add "*;q=0.1") or offer another representation.'
  },
  INTERNAL: {
    statusCode: 500,
    retryable: true,
    fixHint: 'Retry once; if it fails again, inspect logs.'
  }
};

export function actionableErrorFields(code: ErrorCode): ActionableErrorFields {
  return { ...ACTIONABLE_ERROR_DEFAULTS[code] };
}

export class NegotiationError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      cause?: unknown;
      details?: Record<string, unknown>;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'NegotiationError';
    this.code = code;
    this.statusCode = actionableErrorFields(code).statusCode;
    this.details = options?.details;
  }
}

/**
 * The caller's availability map is unusable. This is a server configuration
 * defect, never the client's fault.
 */
export class InvalidAvailabilityError extends NegotiationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_AVAILABILITY', message, { details });
    this.name = 'InvalidAvailabilityError';
  }
}

export class MalformedHeaderError extends NegotiationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('MALFORMED_HEADER', message, { details });
    this.name = 'MalformedHeaderError';
  }
}

/**
 * The header parsed, but nothing on offer is acceptable. Callers map this to
 * `406 Not Acceptable`.
 */
export class NotAcceptableError extends NegotiationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('NOT_ACCEPTABLE', message, { details });
    this.name = 'NotAcceptableError';
  }
}

export function ensureError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}

export function asNegotiationError(value: unknown): NegotiationError {
  if (value instanceof NegotiationError) {
    return value;
  }

  const err = ensureError(value);
  return new NegotiationError('INTERNAL', err.message, { cause: err });
}
