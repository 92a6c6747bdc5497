import { Server } from 'http';
import { config } from './config';
import { configureLogger, logger } from './config/logger';
import { AppContext, closeAppContext, createAppContext } from './context';
import { createApp } from './app';

async function startServer(): Promise<void> {
  // Validate environment configuration
  config.validate();
  configureLogger(config.logging, config.nodeEnv);

  const context = await createAppContext(config);
  const app = createApp(context);

  const port = config.port;
  const server = app.listen(port, () => {
    logger.info('Recon agent server running', {
      port,
      environment: config.nodeEnv,
      storage: config.storage.driver,
      endpoints: ['GET /health', 'POST /recon_agent']
    });
  });

  registerShutdown(server, context);
}

function registerShutdown(server: Server, context: AppContext): void {
  let shuttingDown = false;

  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down gracefully...`);

    server.close(() => {
      closeAppContext(context)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Error during shutdown', { error: error instanceof Error ? error.message : String(error) });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
  startServer().catch((error: unknown) => {
    logger.error('Failed to start server', {
      error: error instanceof Error ? error.message : String(error)
    });
    process.exit(1);
  });
}

export { startServer };
