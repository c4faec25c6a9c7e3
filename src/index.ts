/**
 * Markdown render service entry point.
 *
 * Starts the HTTP listener (MCP tools at /mcp, downloads at /files) when run
 * directly, and re-exports the building blocks for programmatic use.
 */

import { ConfigError, loadConfig } from './config';
import { configureLogging, logger } from './logger';
import { createApp, createAppContext, shutdownAppContext } from './server';

async function main(): Promise<void> {
  const config = loadConfig();
  configureLogging({ level: config.logLevel });

  const context = createAppContext(config);
  const app = createApp(context);

  const server = app.listen(config.port, config.host, () => {
    logger.info('Render service listening', {
      host: config.host,
      port: config.port,
      storage: context.store.kind,
      mcp: `http://${config.host}:${config.port}/mcp`,
    });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close((err) => {
      shutdownAppContext(context)
        .then(() => process.exit(err ? 1 : 0))
        .catch((closeErr: unknown) => {
          logger.error('Failed to release artifact store', { err: closeErr });
          process.exit(1);
        });
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  main().catch((err: unknown) => {
    if (err instanceof ConfigError) {
      logger.error(err.message, { issues: err.issues });
    } else {
      logger.error('Failed to start', { err });
    }
    process.exit(1);
  });
}

// Public exports for programmatic use
export { createApp, createAppContext, shutdownAppContext } from './server';
export type { AppContext, AppContextOverrides } from './server';
export { loadConfig, ConfigError } from './config';
export type { ServiceConfig } from './config';
export * from './domain/errors';
export * from './domain/document';
export * from './domain/artifact';
export * from './storage';
export * from './render';
export { RenderToolHandler } from './tools/render-tools';
export type { RenderOutcome, RenderSuccess, RenderFailure } from './tools/render-tools';
export * from './tools/results';
export { createMcpServer, createMcpRoutes } from './mcp/server';
export { Logger, LogLevel, configureLogging, logger } from './logger';
export type { LogEntry, LogSink } from './logger';
