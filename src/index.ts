import { createApp } from './app';
import { createLibraryContext } from './context';
import { env } from './config/environment';
import { logger } from './config/logger';
import { closeConnection, ensureConnection } from './config/database';

/**
 * Application Entry Point
 *
 * Hydrates the directory from the store, starts the Express server
 * and handles graceful shutdown
 */
async function startServer(): Promise<void> {
  if (env.STORAGE_DRIVER === 'supabase') {
    await ensureConnection();
  }

  const context = createLibraryContext();

  // The directory is authoritative once loaded; nothing is served before that
  const loaded = await context.maintenanceService.loadFromStore();

  const app = createApp(context);

  const server = app.listen(env.PORT, () => {
    logger.info(`
╔════════════════════════════════════════════════════════════╗
║  Library Catalog API Server                                ║
╟────────────────────────────────────────────────────────────╢
║  Library:     ${context.directory.name.padEnd(44)} ║
║  Environment: ${env.NODE_ENV.padEnd(44)} ║
║  Storage:     ${env.STORAGE_DRIVER.padEnd(44)} ║
║  Port:        ${String(env.PORT).padEnd(44)} ║
║  Docs:        http://localhost:${env.PORT}/docs${' '.repeat(Math.max(0, 23 - String(env.PORT).length))} ║
╚════════════════════════════════════════════════════════════╝
    `.trim());

    logger.info('Server is ready to accept connections', loaded);
  });

  const gracefulShutdown = (signal: string) => {
    logger.info(`${signal} received, starting graceful shutdown...`);

    server.close(() => {
      closeConnection();
      logger.info('HTTP server closed');
      process.exit(0);
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Could not close connections in time, forcefully shutting down');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Rejection', { reason });
    gracefulShutdown('unhandledRejection');
  });
}

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
