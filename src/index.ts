import pino, { type Logger } from 'pino';
import { ZodError } from 'zod';
import { resolveConfig, summarizeConfig, type Config } from './config/index.js';
import { AccessGate } from './auth/index.js';
import { OpenAIService } from './upstream/index.js';
import { createGatewayServer } from './proxy/server.js';
import { APP_NAME, APP_VERSION } from './version.js';

const CONFIG_PATH = process.env.CONFIG_PATH || './config/keygate.yaml';

function createLogger(config: Config['logging']): Logger {
  const usePrettyLogs = config.format === 'pretty' && process.env.NODE_ENV !== 'production';
  const logger = pino({
    name: APP_NAME,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
    transport: usePrettyLogs ? { target: 'pino-pretty' } : undefined,
  });

  if (config.format === 'pretty' && process.env.NODE_ENV === 'production') {
    logger.warn('Pretty logging is not available in production, using JSON format instead');
  }

  return logger;
}

async function main() {
  // Load configuration from file, then override with environment variables
  const config = resolveConfig(CONFIG_PATH);
  const logger = createLogger(config.logging);

  logger.info({ version: APP_VERSION }, `Starting ${APP_NAME}...`);
  logger.info({ configPath: CONFIG_PATH }, 'Configuration loaded');

  const summary = summarizeConfig(config);
  for (const warning of summary.warnings) {
    logger.warn(warning);
  }

  const accessGate = new AccessGate(config.auth.access_key);
  const upstream = new OpenAIService(config.openai, logger);

  logger.info(
    { authConfigured: accessGate.isConfigured, openaiConfigured: upstream.isAvailable },
    'Services initialized'
  );

  const server = await createGatewayServer({ config, accessGate, upstream, logger });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down...');

    try {
      await server.close();
      logger.info('HTTP server closed');
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error while closing HTTP server');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  const { listen_port: port, host } = config.server;
  await server.listen({ port, host });

  logger.info({ port, host }, 'Gateway server started');
}

// Handle uncaught errors
process.on('uncaughtException', (err) => {
  console.error('Uncaught exception:', err);
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled rejection at:', promise, 'reason:', reason);
  // Don't exit - let the app continue
});

main().catch((err: unknown) => {
  if (err instanceof ZodError) {
    console.error('Invalid configuration:', err.issues);
  } else {
    console.error('Failed to start:', err);
  }
  process.exit(1);
});
