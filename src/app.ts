import Fastify, { FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import fastifyStatic from '@fastify/static';
import path from 'path';
import fs from 'fs';

import { config } from './config';
import { createChildLogger } from './utils/logger';
import { keyRoutes } from './routes/keys.routes';

const log = createChildLogger('app');

// tsc does not copy the form page, so dist/ falls back to the sources
const possiblePublicPaths = [
  path.join(__dirname, 'public'),
  path.join(__dirname, '..', 'src', 'public'),
];

export async function buildApp(): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own pino logger
    bodyLimit: 10 * 1024 * 1024,
  });

  // ─── Security ─────────────────────────────────────────────
  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'", "'unsafe-inline'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        imgSrc: ["'self'", 'data:'],
        connectSrc: ["'self'"],
      },
    },
  });

  // ─── Form Page ────────────────────────────────────────────
  const publicPath = possiblePublicPaths.find((p) => fs.existsSync(p));
  if (publicPath) {
    await app.register(fastifyStatic, {
      root: publicPath,
      prefix: '/',
    });
  } else {
    log.warn({ searched: possiblePublicPaths }, 'Form page not found, serving API only');
  }

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({ error: 'Not found' });
  });

  // ─── Global Error Handler ────────────────────────────────
  app.setErrorHandler((error: Error & { statusCode?: number }, request, reply) => {
    log.error({
      error: error.message,
      stack: error.stack,
      url: request.url,
      method: request.method,
    }, 'Unhandled error');

    const statusCode = error.statusCode ?? 500;
    return reply.status(statusCode).send({
      error: statusCode < 500 || config.isDev ? error.message : 'Internal server error',
    });
  });

  // ─── API Routes ──────────────────────────────────────────
  await app.register(keyRoutes);

  // ─── Health Check ────────────────────────────────────────
  app.get('/api/health', async () => ({
    status: 'ok',
    version: config.version,
  }));

  return app;
}
