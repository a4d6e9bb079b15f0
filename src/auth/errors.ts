export type AccessErrorKind = 'ServiceUnavailable' | 'Unauthorized' | 'Forbidden';

/**
 * Base class for access gate failures. `kind` and `statusCode` are the stable
 * contract; message text may change.
 */
export abstract class AccessError extends Error {
  abstract readonly kind: AccessErrorKind;
  abstract readonly statusCode: number;
}

export class ServiceUnavailableError extends AccessError {
  readonly kind = 'ServiceUnavailable';
  readonly statusCode = 503;

  constructor(message = 'Authentication not configured. Please set ACCESS_KEY.') {
    super(message);
    this.name = 'ServiceUnavailableError';
  }
}

export class UnauthorizedError extends AccessError {
  readonly kind = 'Unauthorized';
  readonly statusCode = 401;

  constructor(message = 'Authentication required. Please provide access key.') {
    super(message);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends AccessError {
  readonly kind = 'Forbidden';
  readonly statusCode = 403;

  constructor(message = 'Invalid access key') {
    super(message);
    this.name = 'ForbiddenError';
  }
}
