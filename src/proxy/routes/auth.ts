import { FastifyPluginAsync, FastifyRequest } from 'fastify';
import { fingerprint } from '../../auth/index.js';
import { AuthRequestSchema, type AuthResponse } from '../../models/auth.js';
import { parseBody } from '../errors.js';

const authRoutes: FastifyPluginAsync = async (fastify) => {
  const { accessGate, gatewayLogger: logger } = fastify;

  const login = async (request: FastifyRequest): Promise<AuthResponse> => {
    const { access_key: accessKey } = parseBody(AuthRequestSchema, request.body);

    // Failures propagate to the error handler, which logs and renders them
    const result = accessGate.authenticate(accessKey);
    logger.info({ reqId: request.id, key: fingerprint(accessKey) }, 'Login succeeded');
    return result;
  };

  fastify.post('/auth', login);
  fastify.post('/auth/', login);
};

export default authRoutes;
