import { FastifyInstance } from 'fastify';
import { buildApp } from './app';
import { createChildLogger } from './utils/logger';

const log = createChildLogger('server');

export interface ServerAddress {
  host: string;
  port: number;
}

/**
 * Start the web form and register signal handlers for a clean stop.
 */
export async function startServer({ host, port }: ServerAddress): Promise<FastifyInstance> {
  const app = await buildApp();
  await app.listen({ port, host });
  log.info(`Web form running at http://${host}:${port}`);

  // ─── Graceful Shutdown ────────────────────────────────────
  const shutdown = async (signal: string) => {
    log.info(`Received ${signal}, shutting down...`);
    try {
      await app.close();
      process.exit(0);
    } catch (error) {
      log.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  return app;
}
