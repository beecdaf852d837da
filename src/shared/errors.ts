import { Response } from 'express';

export type ErrorCode =
  | 'MISSING_CREDENTIAL'
  | 'MALFORMED_TOKEN'
  | 'BAD_SIGNATURE'
  | 'EXPIRED'
  | 'NOT_YET_VALID'
  | 'REVOKED'
  | 'INVALID_CREDENTIAL'
  | 'FORBIDDEN'
  | 'RATE_LIMITED'
  | 'STORE_UNAVAILABLE'
  | 'VALIDATION_FAILED'
  | 'CONFLICT'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR';

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  MISSING_CREDENTIAL: 401,
  MALFORMED_TOKEN: 401,
  BAD_SIGNATURE: 401,
  EXPIRED: 401,
  NOT_YET_VALID: 401,
  REVOKED: 401,
  INVALID_CREDENTIAL: 401,
  FORBIDDEN: 403,
  RATE_LIMITED: 429,
  STORE_UNAVAILABLE: 500,
  VALIDATION_FAILED: 400,
  CONFLICT: 409,
  NOT_FOUND: 404,
  INTERNAL_ERROR: 500,
};

/**
 * Error surfaced to clients as `{ error: code, message }`. The HTTP status is
 * always derived from the code.
 */
export class GatewayError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'GatewayError';
  }

  get status(): number {
    return STATUS_BY_CODE[this.code];
  }
}

/**
 * Raised by store implementations for any backend failure. The driver error
 * is kept as `cause` for logging and never sent to clients.
 */
export class StoreUnavailableError extends GatewayError {
  constructor(
    public readonly operation: string,
    public readonly cause?: unknown,
  ) {
    super('STORE_UNAVAILABLE', 'Backing store unavailable');
    this.name = 'StoreUnavailableError';
  }
}

export function sendError(res: Response, error: GatewayError): void {
  const body: { error: ErrorCode; message: string; details?: unknown } = {
    error: error.code,
    message: error.message,
  };
  if (error.details !== undefined) {
    body.details = error.details;
  }
  res.status(error.status).json(body);
}
