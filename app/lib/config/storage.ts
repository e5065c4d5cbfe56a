// Configuration loading: JSON file validated with zod, then environment overrides
import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { AppConfig } from './settings';
import { DEFAULT_CONFIG } from './settings';
import { getLogger, isLogLevel } from '~/lib/log/logger';

const log = getLogger({ module: 'ConfigStorage' });

export const DEFAULT_CONFIG_PATH = 'config/config.json';

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

const ConfigFileSchema = z.object({
  server: z.object({
    port: z.number().int().min(0).max(65535).default(DEFAULT_CONFIG.server.port),
    env: z.string().min(1).default(DEFAULT_CONFIG.server.env),
  }).default({}),
  logger: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default(DEFAULT_CONFIG.logger.level),
    pretty: z.boolean().default(DEFAULT_CONFIG.logger.pretty),
    toStdout: z.boolean().default(DEFAULT_CONFIG.logger.toStdout),
    toFile: z.boolean().default(DEFAULT_CONFIG.logger.toFile),
    file: z.string().min(1).default(DEFAULT_CONFIG.logger.file),
    rotate: z.object({
      maxSizeMb: z.number().int().min(1).default(DEFAULT_CONFIG.logger.rotate.maxSizeMb),
      maxBackups: z.number().int().min(0).default(DEFAULT_CONFIG.logger.rotate.maxBackups),
      frequency: z.enum(['daily', 'hourly', 'none']).default(DEFAULT_CONFIG.logger.rotate.frequency),
    }).default({}),
  }).default({}),
  taskQueue: z.object({
    // Values below 1 are clamped up by the worker pool
    workerCount: z.number().int().default(DEFAULT_CONFIG.taskQueue.workerCount),
    queueCapacity: z.number().int().min(1).default(DEFAULT_CONFIG.taskQueue.queueCapacity),
    processingDelayMs: z.number().min(0).default(DEFAULT_CONFIG.taskQueue.processingDelayMs),
    shutdownTimeoutMs: z.number().min(0).default(DEFAULT_CONFIG.taskQueue.shutdownTimeoutMs),
  }).default({}),
});

/**
 * Parse and validate a config object, filling defaults
 */
export function parseConfig(raw: unknown): AppConfig {
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`, { cause: result.error });
  }
  return result.data;
}

/**
 * Apply environment overrides: PORT, APP_ENV, LOG_LEVEL, LOG_PRETTY
 */
export function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const next: AppConfig = {
    server: { ...config.server },
    logger: { ...config.logger, rotate: { ...config.logger.rotate } },
    taskQueue: { ...config.taskQueue },
  };

  if (env.PORT) {
    const port = Number(env.PORT);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new ConfigError(`Invalid PORT: ${env.PORT}`);
    }
    next.server.port = port;
  }

  if (env.APP_ENV) {
    next.server.env = env.APP_ENV;
  }

  if (env.LOG_LEVEL) {
    if (isLogLevel(env.LOG_LEVEL)) {
      next.logger.level = env.LOG_LEVEL;
    } else {
      log.warn({ level: env.LOG_LEVEL }, 'ignoring unknown LOG_LEVEL');
    }
  }

  if (env.LOG_PRETTY === 'true' || env.LOG_PRETTY === 'false') {
    next.logger.pretty = env.LOG_PRETTY === 'true';
  }

  return next;
}

/**
 * Load configuration from disk (CONFIG_PATH or config/config.json).
 * A missing file yields the defaults.
 */
export async function loadConfig(
  configPath: string = process.env.CONFIG_PATH || DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): Promise<AppConfig> {
  const fullPath = path.resolve(configPath);

  let raw: unknown = {};
  try {
    const content = await fs.readFile(fullPath, 'utf-8');
    raw = JSON.parse(content);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      log.info({ path: fullPath }, 'config file not found, using defaults');
    } else {
      throw new ConfigError(`Failed to read config file ${fullPath}`, { cause: error });
    }
  }

  return applyEnvOverrides(parseConfig(raw), env);
}
