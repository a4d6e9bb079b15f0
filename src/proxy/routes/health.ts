import { FastifyPluginAsync } from 'fastify';
import { APP_VERSION } from '../../version.js';

export interface HealthResponse {
  status: 'healthy';
  message: string;
  openai_client: 'available' | 'unavailable';
  authentication: 'configured' | 'not configured';
  service_version: string;
  timestamp: string;
}

const healthRoute: FastifyPluginAsync = async (fastify) => {
  const { accessGate, upstream } = fastify;

  fastify.get('/health', async (): Promise<HealthResponse> => {
    const openaiStatus = upstream.isAvailable ? 'available' : 'unavailable';
    const authStatus = accessGate.isConfigured ? 'configured' : 'not configured';

    return {
      status: 'healthy',
      message: `Service is operational. OpenAI: ${openaiStatus}, Auth: ${authStatus}`,
      openai_client: openaiStatus,
      authentication: authStatus,
      service_version: APP_VERSION,
      timestamp: new Date().toISOString(),
    };
  });
};

export default healthRoute;
