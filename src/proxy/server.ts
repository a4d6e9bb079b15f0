import Fastify, { FastifyInstance, FastifyError } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import type { Config } from '../config/index.js';
import { AccessGate, extractBearerCredential } from '../auth/index.js';
import type { OpenAIService } from '../upstream/index.js';
import { formatErrorResponse } from './errors.js';

/**
 * Resolve the configured CORS origins. "*" reflects any origin; otherwise
 * only well-formed http(s) URLs from the comma-separated list are kept.
 */
export function resolveCorsOrigin(origin: string | undefined): boolean | string[] {
  if (!origin) return false;
  if (origin.trim() === '*') return true;

  const allowed = origin
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => {
      try {
        const url = new URL(entry);
        return url.protocol === 'http:' || url.protocol === 'https:';
      } catch {
        return false;
      }
    });

  return allowed.length > 0 ? allowed : false;
}

export interface GatewayServerDeps {
  config: Config;
  accessGate: AccessGate;
  upstream: OpenAIService;
  logger: Logger;
}

export async function createGatewayServer(deps: GatewayServerDeps): Promise<FastifyInstance> {
  const { config, accessGate, upstream, logger } = deps;

  const app = Fastify({
    logger: false, // We use our own logger
    bodyLimit: config.server.body_limit,
    genReqId: () => randomUUID(),
  });

  // Security headers
  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        imgSrc: ["'self'", 'data:', 'https:'],
      },
    },
    // Enable HSTS only in production to avoid issues on non-HTTPS environments
    hsts:
      process.env.NODE_ENV === 'production'
        ? { maxAge: 60 * 60 * 24 * 180, includeSubDomains: true, preload: false }
        : false,
    referrerPolicy: { policy: 'no-referrer' },
  });

  await app.register(cors, {
    origin: resolveCorsOrigin(config.server.cors_origin),
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    maxAge: 3600,
  });

  // Decorate with dependencies
  app.decorate('config', config);
  app.decorate('accessGate', accessGate);
  app.decorate('upstream', upstream);
  app.decorate('gatewayLogger', logger);

  // Request logging
  app.addHook('onRequest', async (request) => {
    const credential = extractBearerCredential(request.headers.authorization);
    logger.debug(
      {
        reqId: request.id,
        method: request.method,
        url: request.url,
        authenticated: accessGate.authorizeOptional(credential) !== undefined,
      },
      'Incoming request'
    );
  });

  app.addHook('onResponse', async (request, reply) => {
    logger.debug(
      { reqId: request.id, statusCode: reply.statusCode, elapsedMs: reply.elapsedTime },
      'Request completed'
    );
  });

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    const level = statusCode >= 500 ? 'error' : 'warn';
    logger[level](
      {
        err: error,
        reqId: request.id,
        method: request.method,
        url: request.url,
        statusCode,
      },
      'Request error'
    );

    reply.code(statusCode).send(formatErrorResponse(error, request.id));
  });

  app.setNotFoundHandler((request, reply) => {
    reply.code(404).send(
      formatErrorResponse(
        { name: 'NotFound', message: `Route ${request.method} ${request.url} not found`, statusCode: 404 },
        request.id
      )
    );
  });

  // Register routes
  await app.register(import('./routes/health.js'));
  await app.register(import('./routes/auth.js'));
  await app.register(import('./routes/openai.js'));
  await app.register(import('./routes/frontend.js'));

  return app;
}

// Extend Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    accessGate: AccessGate;
    upstream: OpenAIService;
    gatewayLogger: Logger;
  }
}
