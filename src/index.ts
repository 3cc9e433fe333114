import { loadConfig } from './config/index.js';
import { ServerStartError } from './errors/index.js';
import { initSentry } from './instrument.js';
import { createServer } from './server.js';

async function main(): Promise<void> {
  // Load and validate config (fails fast if invalid)
  const config = loadConfig(process.env.OBJSTORE_CONFIG);

  // Create server (connects the storage backend)
  const server = await createServer({ config });

  initSentry(
    {
      dsn: config.sentry?.dsn,
      environment: config.sentry?.environment ?? config.env,
      tracesSampleRate: config.sentry?.tracesSampleRate,
    },
    server.log
  );

  // Start listening
  try {
    const address = await server.listen({
      host: config.server.host,
      port: config.server.port,
    });
    server.log.info(`Server listening at ${address}`);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    server.log.fatal(new ServerStartError(message), 'Server did not start');
    process.exit(1);
  }

  // Graceful shutdown
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
