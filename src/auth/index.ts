import { createHash, timingSafeEqual } from 'crypto';
import { ForbiddenError, ServiceUnavailableError, UnauthorizedError } from './errors.js';
import type { AccessDecision, AuthResult, GrantedDecision } from './types.js';

export * from './errors.js';
export type { AccessDecision, AuthResult, GrantedDecision } from './types.js';

function sha256(data: string): Buffer {
  return createHash('sha256').update(data).digest();
}

/**
 * Constant-time string comparison. Both sides are hashed first so that the
 * comparison time does not depend on where, or whether, the lengths differ.
 */
export function safeCompare(a: string, b: string): boolean {
  return timingSafeEqual(sha256(a), sha256(b));
}

/**
 * Short, non-reversible fingerprint of a credential for log lines
 */
export function fingerprint(credential: string): string {
  return sha256(credential).toString('hex').substring(0, 8);
}

/**
 * Extract the credential from an `Authorization: Bearer <credential>` header.
 * Returns undefined for a missing header, a non-bearer scheme or an empty credential.
 */
export function extractBearerCredential(header: string | undefined): string | undefined {
  if (!header) return undefined;

  const separator = header.indexOf(' ');
  if (separator === -1) return undefined;

  const scheme = header.slice(0, separator);
  const credential = header.slice(separator + 1);
  if (scheme.toLowerCase() !== 'bearer' || !credential) {
    return undefined;
  }
  return credential;
}

/**
 * Grants or denies access to protected operations using a single shared secret.
 *
 * The gate is immutable once constructed and keeps no per-call state, so one
 * instance can serve any number of concurrent requests.
 */
export class AccessGate {
  private readonly secret: string | undefined;

  constructor(secret?: string) {
    this.secret = secret ? secret : undefined;
  }

  get isConfigured(): boolean {
    return this.secret !== undefined;
  }

  evaluate(presented: string | undefined): AccessDecision {
    if (this.secret === undefined) {
      return { status: 'unavailable' };
    }
    if (presented === undefined) {
      return { status: 'unauthenticated' };
    }
    if (!safeCompare(presented, this.secret)) {
      return { status: 'denied' };
    }
    return { status: 'granted', credential: presented };
  }

  /**
   * Login-style check. The issued token is the submitted key itself: it is
   * neither signed nor expiring.
   */
  authenticate(submitted: string): AuthResult {
    const decision = this.evaluate(submitted);
    switch (decision.status) {
      case 'unavailable':
        throw new ServiceUnavailableError();
      case 'granted':
        return {
          authenticated: true,
          message: 'Authentication successful',
          token: decision.credential,
        };
      default:
        throw new ForbiddenError();
    }
  }

  /**
   * Guard for protected operations, failing with 503, 401 or 403 in that precedence
   */
  authorize(presented: string | undefined): GrantedDecision {
    const decision = this.evaluate(presented);
    switch (decision.status) {
      case 'unavailable':
        throw new ServiceUnavailableError();
      case 'unauthenticated':
        throw new UnauthorizedError();
      case 'denied':
        throw new ForbiddenError('Invalid access key.');
      case 'granted':
        return decision;
    }
  }

  authorizeOptional(presented: string | undefined): string | undefined {
    const decision = this.evaluate(presented);
    return decision.status === 'granted' ? decision.credential : undefined;
  }
}
