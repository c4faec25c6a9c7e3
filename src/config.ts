/**
 * Service configuration.
 *
 * Read once at startup from environment variables. Every value has a
 * default, so an empty environment yields a working local service.
 *
 *   HOST=0.0.0.0 PORT=9000 ARTIFACT_STORE=disk ARTIFACT_DIR=/var/tmp/md node dist/index.js
 */

import os from 'os';
import path from 'path';
import { z } from 'zod';
import { LogLevel } from './logger';
import { DEFAULT_STORE_OPTIONS } from './storage/store';

export interface ServiceConfig {
  host: string;
  port: number;
  /** Prefix for download URLs. Empty means URLs are relative paths. */
  publicBaseUrl: string;
  store: {
    kind: 'memory' | 'disk';
    directory: string;
    maxArtifactBytes: number;
    maxArtifacts: number;
    maxTotalBytes: number;
    ttlMs: number;
  };
  renderTimeoutMs: number;
  logLevel: LogLevel;
}

export const DEFAULT_RENDER_TIMEOUT_MS = 30_000;

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  HOST: z.string().min(1).default('127.0.0.1'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  PUBLIC_BASE_URL: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, ''))
    .optional(),
  ARTIFACT_STORE: z.enum(['memory', 'disk']).default('memory'),
  ARTIFACT_DIR: z.string().min(1).default(path.join(os.tmpdir(), 'md-render-artifacts')),
  ARTIFACT_MAX_BYTES: positiveInt(DEFAULT_STORE_OPTIONS.maxArtifactBytes),
  ARTIFACT_MAX_COUNT: positiveInt(DEFAULT_STORE_OPTIONS.maxArtifacts),
  ARTIFACT_MAX_TOTAL_BYTES: positiveInt(DEFAULT_STORE_OPTIONS.maxTotalBytes),
  ARTIFACT_TTL_MS: z.coerce.number().int().min(0).default(DEFAULT_STORE_OPTIONS.ttlMs),
  RENDER_TIMEOUT_MS: positiveInt(DEFAULT_RENDER_TIMEOUT_MS),
  LOG_LEVEL: z.nativeEnum(LogLevel).default(LogLevel.Info),
});

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Parse configuration from an environment map. Throws ConfigError listing every bad variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  // Treat empty strings as unset so `PORT=` falls back to the default.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const e = parsed.data;
  return {
    host: e.HOST,
    port: e.PORT,
    publicBaseUrl: e.PUBLIC_BASE_URL ?? '',
    store: {
      kind: e.ARTIFACT_STORE,
      directory: e.ARTIFACT_DIR,
      maxArtifactBytes: e.ARTIFACT_MAX_BYTES,
      maxArtifacts: e.ARTIFACT_MAX_COUNT,
      maxTotalBytes: e.ARTIFACT_MAX_TOTAL_BYTES,
      ttlMs: e.ARTIFACT_TTL_MS,
    },
    renderTimeoutMs: e.RENDER_TIMEOUT_MS,
    logLevel: e.LOG_LEVEL,
  };
}
