import { describe, it, expect } from 'vitest';
import {
  AccessGate,
  AccessError,
  ForbiddenError,
  ServiceUnavailableError,
  UnauthorizedError,
  extractBearerCredential,
  fingerprint,
  safeCompare,
} from '../src/auth/index.js';

const SECRET = 'abc123';

function captureError(fn: () => unknown): AccessError {
  try {
    fn();
  } catch (err) {
    if (err instanceof AccessError) return err;
    throw err;
  }
  throw new Error('Expected an AccessError to be thrown');
}

describe('safeCompare', () => {
  it('should match identical strings', () => {
    expect(safeCompare('abc123', 'abc123')).toBe(true);
  });

  it('should be case-sensitive', () => {
    expect(safeCompare('ABC123', 'abc123')).toBe(false);
  });

  it('should reject strings of different lengths', () => {
    expect(safeCompare('abc', 'abc123')).toBe(false);
    expect(safeCompare('abc1234', 'abc123')).toBe(false);
    expect(safeCompare('', 'abc123')).toBe(false);
  });

  it('should match two empty strings', () => {
    expect(safeCompare('', '')).toBe(true);
  });
});

describe('fingerprint', () => {
  it('should return 8 hex characters', () => {
    expect(fingerprint(SECRET)).toMatch(/^[a-f0-9]{8}$/);
  });

  it('should not contain the credential', () => {
    expect(fingerprint('test-secret')).not.toContain('test');
  });

  it('should be stable for the same input', () => {
    expect(fingerprint(SECRET)).toBe(fingerprint(SECRET));
  });
});

describe('extractBearerCredential', () => {
  it('should extract the credential from a bearer header', () => {
    expect(extractBearerCredential('Bearer abc123')).toBe('abc123');
  });

  it('should accept the scheme in any case', () => {
    expect(extractBearerCredential('bearer abc123')).toBe('abc123');
    expect(extractBearerCredential('BEARER abc123')).toBe('abc123');
  });

  it('should return undefined for a missing header', () => {
    expect(extractBearerCredential(undefined)).toBeUndefined();
    expect(extractBearerCredential('')).toBeUndefined();
  });

  it('should return undefined for other schemes', () => {
    expect(extractBearerCredential('Basic dXNlcjpwYXNz')).toBeUndefined();
    expect(extractBearerCredential('Token abc123')).toBeUndefined();
  });

  it('should return undefined when the credential is missing', () => {
    expect(extractBearerCredential('Bearer')).toBeUndefined();
    expect(extractBearerCredential('Bearer ')).toBeUndefined();
  });

  it('should keep everything after the first space', () => {
    expect(extractBearerCredential('Bearer a b')).toBe('a b');
  });
});

describe('AccessGate', () => {
  describe('configuration', () => {
    it('should be configured with a non-empty secret', () => {
      expect(new AccessGate(SECRET).isConfigured).toBe(true);
    });

    it('should treat an absent secret as not configured', () => {
      expect(new AccessGate().isConfigured).toBe(false);
      expect(new AccessGate(undefined).isConfigured).toBe(false);
    });

    it('should treat an empty secret as not configured', () => {
      expect(new AccessGate('').isConfigured).toBe(false);
    });

    it('should keep separate gates independent', () => {
      const first = new AccessGate('first-secret');
      const second = new AccessGate('second-secret');

      expect(first.authorizeOptional('first-secret')).toBe('first-secret');
      expect(first.authorizeOptional('second-secret')).toBeUndefined();
      expect(second.authorizeOptional('second-secret')).toBe('second-secret');
    });
  });

  describe('evaluate', () => {
    const gate = new AccessGate(SECRET);

    it('should grant a matching credential', () => {
      expect(gate.evaluate(SECRET)).toEqual({ status: 'granted', credential: SECRET });
    });

    it('should deny a mismatched credential', () => {
      expect(gate.evaluate('wrong')).toEqual({ status: 'denied' });
    });

    it('should report a missing credential as unauthenticated', () => {
      expect(gate.evaluate(undefined)).toEqual({ status: 'unauthenticated' });
    });

    it('should report unavailable when no secret is configured', () => {
      const unconfigured = new AccessGate();
      expect(unconfigured.evaluate(SECRET)).toEqual({ status: 'unavailable' });
      expect(unconfigured.evaluate(undefined)).toEqual({ status: 'unavailable' });
    });
  });

  describe('authenticate', () => {
    it('should grant and echo the key back as the token', () => {
      const gate = new AccessGate(SECRET);
      expect(gate.authenticate(SECRET)).toEqual({
        authenticated: true,
        message: 'Authentication successful',
        token: SECRET,
      });
    });

    it('should reject a wrong key as Forbidden', () => {
      const error = captureError(() => new AccessGate(SECRET).authenticate('wrong'));
      expect(error).toBeInstanceOf(ForbiddenError);
      expect(error.kind).toBe('Forbidden');
      expect(error.statusCode).toBe(403);
    });

    it('should reject an empty key as Forbidden', () => {
      const error = captureError(() => new AccessGate(SECRET).authenticate(''));
      expect(error.kind).toBe('Forbidden');
    });

    it('should be case-sensitive', () => {
      const error = captureError(() => new AccessGate(SECRET).authenticate('ABC123'));
      expect(error.kind).toBe('Forbidden');
    });

    it('should fail with ServiceUnavailable when not configured', () => {
      for (const submitted of [SECRET, 'wrong', '']) {
        const error = captureError(() => new AccessGate().authenticate(submitted));
        expect(error).toBeInstanceOf(ServiceUnavailableError);
        expect(error.kind).toBe('ServiceUnavailable');
        expect(error.statusCode).toBe(503);
      }
    });

    it('should grant only an exact match', () => {
      const gate = new AccessGate(SECRET);
      const candidates = ['abc12', 'abc1234', ' abc123', 'abc123 ', 'xbc123', SECRET];

      const granted = candidates.filter((candidate) => {
        try {
          gate.authenticate(candidate);
          return true;
        } catch (err) {
          expect(err).toBeInstanceOf(ForbiddenError);
          return false;
        }
      });

      expect(granted).toEqual([SECRET]);
    });
  });

  describe('authorize', () => {
    it('should grant a matching credential', () => {
      expect(new AccessGate(SECRET).authorize(SECRET)).toEqual({
        status: 'granted',
        credential: SECRET,
      });
    });

    it('should fail with Unauthorized when no credential is presented', () => {
      const error = captureError(() => new AccessGate(SECRET).authorize(undefined));
      expect(error).toBeInstanceOf(UnauthorizedError);
      expect(error.kind).toBe('Unauthorized');
      expect(error.statusCode).toBe(401);
    });

    it('should fail with Forbidden for a mismatched credential', () => {
      const error = captureError(() => new AccessGate(SECRET).authorize('wrong'));
      expect(error).toBeInstanceOf(ForbiddenError);
      expect(error.statusCode).toBe(403);
    });

    it('should report ServiceUnavailable before a missing credential', () => {
      const error = captureError(() => new AccessGate().authorize(undefined));
      expect(error.kind).toBe('ServiceUnavailable');
    });

    it('should report ServiceUnavailable for any credential when not configured', () => {
      const error = captureError(() => new AccessGate('').authorize(SECRET));
      expect(error.statusCode).toBe(503);
    });
  });

  describe('authorizeOptional', () => {
    const gate = new AccessGate(SECRET);

    it('should return the credential when it validates', () => {
      expect(gate.authorizeOptional(SECRET)).toBe(SECRET);
    });

    it('should return undefined for a missing or wrong credential', () => {
      expect(gate.authorizeOptional(undefined)).toBeUndefined();
      expect(gate.authorizeOptional('wrong')).toBeUndefined();
      expect(gate.authorizeOptional('')).toBeUndefined();
    });

    it('should return undefined when not configured', () => {
      expect(new AccessGate().authorizeOptional(SECRET)).toBeUndefined();
    });

    it('should agree with authorize for every input', () => {
      const inputs = [SECRET, 'wrong', '', undefined];
      for (const gateUnderTest of [gate, new AccessGate()]) {
        for (const input of inputs) {
          let authorized: string | undefined;
          try {
            authorized = gateUnderTest.authorize(input).credential;
          } catch (err) {
            expect(err).toBeInstanceOf(AccessError);
            authorized = undefined;
          }
          expect(gateUnderTest.authorizeOptional(input)).toBe(authorized);
        }
      }
    });
  });

  describe('idempotence', () => {
    it('should return the same decision for repeated calls', () => {
      const gate = new AccessGate(SECRET);
      const decisions = Array.from({ length: 20 }, () => gate.evaluate('wrong'));
      expect(new Set(decisions.map((d) => d.status))).toEqual(new Set(['denied']));

      // No lockout after repeated failures
      expect(gate.authenticate(SECRET).token).toBe(SECRET);
    });
  });
});
