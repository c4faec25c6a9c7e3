/**
 * Express server configuration.
 *
 * Assembles the HTTP surface (MCP endpoint, file downloads, health) around
 * one explicitly constructed application context. The context owns the
 * artifact store; shutdownAppContext() releases it.
 */

import express from 'express';
import { ServiceConfig, loadConfig } from './config';
import { createFileRoutes } from './api/files';
import { errorHandler, requestLogger } from './api/middleware';
import { Logger, logger as rootLogger } from './logger';
import { SERVER_INFO, createMcpRoutes } from './mcp/server';
import { createRendererRegistry } from './render';
import { RendererRegistry } from './render/renderer';
import { createArtifactStore } from './storage';
import { ArtifactStore } from './storage/store';
import { RenderToolHandler } from './tools/render-tools';

/** Application context containing all services. */
export interface AppContext {
  config: ServiceConfig;
  store: ArtifactStore;
  renderers: RendererRegistry;
  handler: RenderToolHandler;
  logger: Logger;
  startedAt: number;
}

/** Replaceable collaborators, mostly for tests. */
export interface AppContextOverrides {
  store?: ArtifactStore;
  renderers?: RendererRegistry;
  logger?: Logger;
}

/** Create the application context with all services. */
export function createAppContext(
  config: ServiceConfig = loadConfig(),
  overrides: AppContextOverrides = {},
): AppContext {
  const log = overrides.logger ?? rootLogger;
  const store = overrides.store ?? createArtifactStore(config.store, {}, log);
  const renderers = overrides.renderers ?? createRendererRegistry();
  const handler = new RenderToolHandler({
    store,
    renderers,
    renderTimeoutMs: config.renderTimeoutMs,
    publicBaseUrl: config.publicBaseUrl,
    logger: log,
  });

  return {
    config,
    store,
    renderers,
    handler,
    logger: log,
    startedAt: Date.now(),
  };
}

/** Release everything the context owns. */
export async function shutdownAppContext(ctx: AppContext): Promise<void> {
  await ctx.store.close();
}

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const app = express();

  app.use(requestLogger(ctx.logger));
  app.use(express.json({ limit: '10mb' }));

  app.get('/health', (_req, res) => {
    const stats = ctx.store.stats();
    res.json({
      status: 'ok',
      name: SERVER_INFO.name,
      version: SERVER_INFO.version,
      uptimeMs: Date.now() - ctx.startedAt,
      storage: ctx.store.kind,
      artifacts: stats.count,
      artifactBytes: stats.totalBytes,
    });
  });

  app.use('/mcp', createMcpRoutes(ctx.handler, ctx.logger));
  app.use('/files', createFileRoutes(ctx.store));

  app.use(errorHandler(ctx.logger));

  return app;
}
