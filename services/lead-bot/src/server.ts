import fastify, { type FastifyInstance } from 'fastify';
import formbody from '@fastify/formbody';
import { createLogger } from './lib/logger.js';
import healthRoutes from './routes/health.js';
import leadWebhookRoutes, { type LeadWebhookOptions } from './routes/leadWebhook.js';

const logger = createLogger({ module: 'server' });

export interface ServerOptions {
  /** Website lead ingress; only /health is served without it. */
  webhook: LeadWebhookOptions | null;
}

export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const app = fastify({
    logger: false,
  });

  await app.register(formbody);
  await app.register(healthRoutes);
  if (options.webhook) {
    await app.register(leadWebhookRoutes, options.webhook);
  }

  return app;
}

export async function startServer(port: number, options: ServerOptions): Promise<FastifyInstance> {
  const app = await buildServer(options);

  await app.listen({ port, host: '0.0.0.0' });
  logger.info({ port, webhook: options.webhook !== null }, 'Fastify HTTP server started');

  return app;
}
