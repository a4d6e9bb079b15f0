import { FastifyPluginAsync, FastifyRequest } from 'fastify';
import { extractBearerCredential, fingerprint } from '../../auth/index.js';
import {
  ChatRequestSchema,
  CompletionRequestSchema,
  EmbeddingRequestSchema,
  ImageRequestSchema,
} from '../../models/openai.js';
import { parseBody } from '../errors.js';

const openaiRoutes: FastifyPluginAsync = async (fastify) => {
  const { accessGate, upstream, gatewayLogger: logger } = fastify;

  // Bearer key guard, runs before the body is read
  fastify.addHook('onRequest', async (request: FastifyRequest) => {
    const { credential } = accessGate.authorize(
      extractBearerCredential(request.headers.authorization)
    );
    logger.debug({ reqId: request.id, key: fingerprint(credential) }, 'Access granted');
  });

  fastify.post('/chat', async (request) => {
    return upstream.chatCompletion(parseBody(ChatRequestSchema, request.body));
  });

  fastify.post('/completion', async (request) => {
    return upstream.textCompletion(parseBody(CompletionRequestSchema, request.body));
  });

  fastify.post('/images/generate', async (request) => {
    return upstream.generateImage(parseBody(ImageRequestSchema, request.body));
  });

  fastify.post('/embeddings', async (request) => {
    return upstream.createEmbeddings(parseBody(EmbeddingRequestSchema, request.body));
  });

  fastify.get('/models', async () => {
    return upstream.listModels();
  });
};

export default openaiRoutes;
