// src/server.ts
import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';

import { config } from './config';
import { openDatabase } from './db';
import { createServices, type AppServices } from './services';

// Observability
import {
  createLogger,
  getLogLevel,
  registerObservability,
  requestIdGenerator,
} from './observability';

// Rate limiting middleware
import { registerRateLimit } from './middleware/rateLimit';

// Routes
import { createQueryRoutes } from './routes/query';
import { createIngestRoutes } from './routes/ingest';
import { createHealthRoutes } from './routes/health';
import metricsRoutes from './routes/metrics';

/**
 * Build the Fastify app around already-wired services.
 * Tests call this directly and drive it with `inject`.
 */
export async function buildServer(services: AppServices): Promise<FastifyInstance> {
  // Create Fastify with custom request ID generator for correlation
  const app = Fastify({
    logger: { level: getLogLevel() },
    genReqId: requestIdGenerator,
  });

  // Register observability hooks (request ID, request logging, metrics)
  registerObservability(app, services);

  await app.register(cors, { origin: config.cors.origins });

  // Register rate limiting plugin (must be before route registration)
  await registerRateLimit(app);

  await app.register(createQueryRoutes(services.pipeline));
  await app.register(createIngestRoutes(services));
  await app.register(createHealthRoutes(services));
  await app.register(metricsRoutes);

  app.addHook('onClose', async () => {
    await services.db.close();
  });

  return app;
}

async function main() {
  const db = await openDatabase(config.database.path);
  const services = createServices(db);
  const app = await buildServer(services);

  app.log.info({
    cwd: process.cwd(),
    dbFile: config.database.path,
    node: process.version,
    aiProvider: services.providers.language,
    embeddingProvider: services.providers.embedding,
  }, 'Hybrid QA API boot');

  const shutdown = (signal: string) => {
    app.log.info({ signal }, 'Shutting down');
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        startupLogger.error({ err }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await app.listen({ port: config.port, host: '0.0.0.0' });
  app.log.info({ port: config.port }, 'API listening');
}

// Module-level logger for startup errors
const startupLogger = createLogger('startup');

if (require.main === module) {
  main().catch((err) => {
    startupLogger.fatal({ err }, 'Server startup failed');
    process.exit(1);
  });
}
