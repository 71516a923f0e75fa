import { loadConfig } from './config/index.js';
import { initSentry } from './instrument.js';
import { createServer } from './server.js';

async function main(): Promise<void> {
  // Load and validate config (fails fast if invalid)
  const config = loadConfig();
  const sentryEnabled = initSentry(config.sentry);

  // Opens storage: MongoDB probe first, file store as fallback
  const server = await createServer({ config });
  server.log.info({ sentry: sentryEnabled }, 'Error reporting configured');

  try {
    const address = await server.listen({
      host: config.server.host,
      port: config.server.port,
    });
    server.log.info(`Server listening at ${address}`);
  } catch (err) {
    server.log.error(err, 'Failed to start server');
    await server.close();
    process.exit(1);
  }

  // Graceful shutdown closes the storage adapter via the onClose hook
  const shutdown = async (signal: string): Promise<void> => {
    server.log.info(`Received ${signal}, shutting down...`);
    await server.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
