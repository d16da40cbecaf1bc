import 'dotenv/config';
import { createLogger } from '@/observability/logger.js';
import { applyEnvOverrides, loadCoreConfig } from '@/config/loader.js';
import { createServer, createSwitchboard } from './app.js';

const CONFIG_PATH = process.env['SWITCHBOARD_CONFIG'] ?? 'config/switchboard.json';

async function start(): Promise<void> {
  const bootLogger = createLogger();

  const loaded = await loadCoreConfig(CONFIG_PATH);
  const config = loaded.ok ? applyEnvOverrides(loaded.value) : loaded;
  if (!config.ok) {
    bootLogger.fatal('Failed to load configuration', {
      component: 'main',
      error: config.error.message,
      context: config.error.context,
    });
    process.exit(1);
  }

  const { server: serverConfig } = config.value;
  const logger = createLogger({ level: serverConfig.logLevel });

  try {
    const deps = createSwitchboard(config.value, logger);
    const server = await createServer(deps, config.value);

    // Graceful shutdown
    const shutdown = async (): Promise<void> => {
      logger.info('Shutting down...', { component: 'main' });
      await server.close();
    };

    process.on('SIGTERM', () => void shutdown());
    process.on('SIGINT', () => void shutdown());

    await server.listen({ port: serverConfig.port, host: serverConfig.host });
    logger.info(`Server listening on ${serverConfig.host}:${serverConfig.port}`, { component: 'main' });
  } catch (err: unknown) {
    logger.fatal('Failed to start server', {
      component: 'main',
      error: err instanceof Error ? err.message : String(err),
    });
    process.exit(1);
  }
}

void start();
