import 'dotenv/config';
import { createServer } from '@/api/server.js';
import { bootstrap } from '@/bootstrap.js';
import { loadConfig } from '@/config/loader.js';
import { createLogger } from '@/observability/logger.js';

const logger = createLogger();

async function start(): Promise<void> {
  const loaded = await loadConfig();
  if (!loaded.ok) {
    logger.fatal('Invalid configuration', {
      component: 'main',
      error: loaded.error.message,
      context: loaded.error.context,
    });
    process.exit(1);
  }
  const config = loaded.value;

  const port = Number(process.env['PORT'] ?? config.server.port);
  const host = process.env['HOST'] ?? config.server.host;

  try {
    const services = await bootstrap(config, { logger });
    const server = await createServer(
      {
        taskManager: services.taskManager,
        teams: services.teams,
        toolRegistry: services.registry,
        logger,
      },
      { corsOrigin: process.env['CORS_ORIGIN'] },
    );

    // Graceful shutdown: running tasks are cancelled and record their outcome
    const shutdown = async (): Promise<void> => {
      logger.info('Shutting down...', { component: 'main' });
      await server.close();
      await services.shutdown();
    };

    process.on('SIGTERM', () => void shutdown());
    process.on('SIGINT', () => void shutdown());

    await server.listen({ port, host });
    logger.info(`Server listening on ${host}:${port}`, { component: 'main' });
  } catch (err: unknown) {
    logger.fatal('Failed to start server', {
      component: 'main',
      error: err instanceof Error ? err.message : String(err),
    });
    process.exit(1);
  }
}

void start();
