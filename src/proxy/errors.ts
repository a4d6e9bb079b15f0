import { randomUUID } from 'crypto';
import type { z } from 'zod';
import { AccessError } from '../auth/index.js';
import { UpstreamError, UpstreamUnavailableError } from '../upstream/index.js';

export interface ErrorResponse {
  error: string;
  message: string;
  details?: unknown;
  timestamp: string;
  request_id: string;
}

/**
 * Request body rejected by schema validation
 */
export class ValidationError extends Error {
  readonly kind = 'ValidationError';
  readonly statusCode = 400;
  readonly details: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    super(issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '));
    this.name = 'ValidationError';
    this.details = issues;
  }
}

export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw new ValidationError(result.error.issues);
  }
  return result.data;
}

interface HttpErrorLike {
  name: string;
  message: string;
  statusCode?: number;
  code?: string;
}

export function errorKind(error: HttpErrorLike): string {
  if (
    error instanceof AccessError ||
    error instanceof UpstreamError ||
    error instanceof UpstreamUnavailableError ||
    error instanceof ValidationError
  ) {
    return error.kind;
  }
  return error.code ?? error.name;
}

/**
 * Build the JSON body for an error reply. Errors without a status code are
 * internal and their message is not exposed.
 */
export function formatErrorResponse(error: HttpErrorLike, requestId?: string): ErrorResponse {
  const exposed = error.statusCode !== undefined;

  const response: ErrorResponse = {
    error: exposed ? errorKind(error) : 'InternalServerError',
    message: exposed ? error.message : 'Internal Server Error',
    timestamp: new Date().toISOString(),
    request_id: requestId ?? randomUUID(),
  };

  if (error instanceof ValidationError) {
    response.details = error.details;
  }

  return response;
}
