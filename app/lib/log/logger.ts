import path from 'path';
import pino from 'pino';
import pretty from 'pino-pretty';

// Thin wrapper around pino.
// Configure via env before configureLogger() runs:
// - LOG_LEVEL: 'debug' | 'info' | 'warn' | 'error' | 'silent' (default: 'info')
// - LOG_PRETTY: 'false' to write raw JSON lines to stdout

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug: (obj: object, msg?: string) => void;
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  child: (bindings: Record<string, unknown>) => Logger;
}

export interface LogRotationConfig {
  /** Rotate once the active file reaches this size */
  maxSizeMb: number;
  /** Rotated files kept besides the active one */
  maxBackups: number;
  frequency: 'daily' | 'hourly' | 'none';
}

// Sinks only; the level is applied separately through setLogLevel()
export interface LoggerSinkConfig {
  pretty: boolean;
  toStdout: boolean;
  toFile: boolean;
  file: string;
  rotate: LogRotationConfig;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(level => level === value);
}

/**
 * Options for the pino-roll transport. Rotated files are numbered before the
 * extension: logs/app.log rolls to logs/app.1.log, logs/app.2.log, ...
 */
export function rollOptions(config: Pick<LoggerSinkConfig, 'file' | 'rotate'>) {
  const extension = path.extname(config.file);
  return {
    file: extension ? config.file.slice(0, -extension.length) : config.file,
    ...(extension ? { extension } : {}),
    size: `${config.rotate.maxSizeMb}m`,
    ...(config.rotate.frequency !== 'none' ? { frequency: config.rotate.frequency } : {}),
    limit: { count: config.rotate.maxBackups },
    mkdir: true,
  };
}

function createStreams(config: LoggerSinkConfig): pino.StreamEntry[] {
  const streams: pino.StreamEntry[] = [];

  if (config.toStdout || !config.toFile) {
    streams.push({
      level: 'debug',
      stream: config.pretty
        ? pretty({ colorize: true, translateTime: 'SYS:standard' })
        : process.stdout,
    });
  }

  if (config.toFile) {
    streams.push({
      level: 'debug',
      stream: pino.transport({ target: 'pino-roll', options: rollOptions(config) }),
    });
  }

  return streams;
}

function createBaseLogger(level: LogLevel, config: LoggerSinkConfig): pino.Logger {
  return pino({ level }, pino.multistream(createStreams(config)));
}

const envLevel = process.env.LOG_LEVEL;

let baseLogger: pino.Logger = createBaseLogger(isLogLevel(envLevel) ? envLevel : 'info', {
  pretty: process.env.LOG_PRETTY !== 'false',
  toStdout: true,
  toFile: false,
  file: '',
  rotate: { maxSizeMb: 100, maxBackups: 3, frequency: 'none' },
});

// Bumped whenever the base logger or its level changes so bound loggers rebuild their child.
let generation = 0;

/**
 * Replace the process-wide sinks, keeping the current level. Loggers handed
 * out by getLogger() before this call switch over on their next write.
 */
export function configureLogger(config: LoggerSinkConfig): void {
  baseLogger = createBaseLogger(getLogLevel(), config);
  generation++;
}

export function setLogLevel(level: LogLevel): void {
  if (!isLogLevel(level)) return;
  baseLogger.level = level;
  generation++;
}

export function getLogLevel(): LogLevel {
  const level = baseLogger.level;
  return isLogLevel(level) ? level : 'info';
}

function bindLogger(bindings: Record<string, unknown>): Logger {
  let bound: pino.Logger | null = null;
  let boundGeneration = -1;

  const resolve = (): pino.Logger => {
    if (bound === null || boundGeneration !== generation) {
      bound = Object.keys(bindings).length > 0 ? baseLogger.child(bindings) : baseLogger;
      boundGeneration = generation;
    }
    return bound;
  };

  return {
    debug: (obj, msg) => resolve().debug(obj, msg),
    info: (obj, msg) => resolve().info(obj, msg),
    warn: (obj, msg) => resolve().warn(obj, msg),
    error: (obj, msg) => resolve().error(obj, msg),
    child: (more) => bindLogger({ ...bindings, ...more }),
  };
}

export function getLogger(bindings: Record<string, unknown> = {}): Logger {
  return bindLogger(bindings);
}
