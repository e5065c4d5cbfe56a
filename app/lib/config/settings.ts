// Application configuration for the task queue service

import type { LogLevel, LogRotationConfig } from '~/lib/log/logger';

export interface AppConfig {
  server: {
    port: number;
    env: string;
  };

  // Log sinks. At least one of toStdout / toFile; stdout is used when both are off.
  logger: {
    level: LogLevel;
    pretty: boolean;
    toStdout: boolean;
    toFile: boolean;
    file: string;
    rotate: LogRotationConfig;
  };

  taskQueue: {
    workerCount: number;
    queueCapacity: number;
    processingDelayMs: number;
    shutdownTimeoutMs: number;
  };
}

// Default configuration
export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 8080,
    env: 'development',
  },
  logger: {
    level: 'info',
    pretty: true,
    toStdout: true,
    toFile: false,
    file: 'logs/app.log',
    rotate: {
      maxSizeMb: 100,
      maxBackups: 3,
      frequency: 'none',
    },
  },
  taskQueue: {
    workerCount: 5,
    queueCapacity: 100,
    processingDelayMs: 120_000, // 2 minutes
    shutdownTimeoutMs: 5_000,
  },
};

export function isDevelopment(config: AppConfig): boolean {
  return config.server.env === 'development';
}
