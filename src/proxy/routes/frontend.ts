import { FastifyPluginAsync } from 'fastify';
import fastifyStatic from '@fastify/static';
import { existsSync, statSync } from 'fs';
import { join, resolve } from 'path';
import { formatErrorResponse } from '../errors.js';

const INDEX_FILE = 'index.html';

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

const frontendRoute: FastifyPluginAsync = async (fastify) => {
  const { config, gatewayLogger: logger } = fastify;

  const staticPath = resolve(process.cwd(), config.static.dir);
  const available = isDirectory(staticPath);

  if (available) {
    const prefix = config.static.mount_path.endsWith('/')
      ? config.static.mount_path
      : `${config.static.mount_path}/`;

    await fastify.register(fastifyStatic, {
      root: staticPath,
      prefix,
      index: false,
    });
    logger.info({ path: staticPath, prefix }, 'Serving frontend static files');
  } else {
    logger.warn({ path: staticPath }, 'Static directory not found, frontend will not be served');
  }

  fastify.get('/', async (request, reply) => {
    if (!available || !existsSync(join(staticPath, INDEX_FILE))) {
      return reply.code(404).send(
        formatErrorResponse(
          {
            name: 'NotFound',
            message: 'Frontend not found. Please ensure index.html exists in the public directory.',
            statusCode: 404,
          },
          request.id
        )
      );
    }
    return reply.sendFile(INDEX_FILE);
  });
};

export default frontendRoute;
