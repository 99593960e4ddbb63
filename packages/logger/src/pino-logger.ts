import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';

import pino from 'pino';

import { validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';

export type Logger = pino.Logger;

interface TransportMode {
  console: boolean;
  file: boolean;
}

interface TransportTarget {
  level: string;
  options: Record<string, unknown>;
  target: string;
}

let env: LoggerEnvConfig | undefined;
let rootLogger: Logger | undefined;
let transportMode: TransportMode | undefined;

const loggerCache = new Map<string, Logger>();

function loggerEnv(): LoggerEnvConfig {
  if (!env) {
    env = validateLoggerEnv(process.env);
  }
  return env;
}

function currentTransportMode(): TransportMode {
  if (!transportMode) {
    const config = loggerEnv();
    transportMode = { console: config.LOGGER_CONSOLE_ENABLED, file: config.LOGGER_FILE_LOG_ENABLED };
  }
  return transportMode;
}

/**
 * Pads or truncates a category to a fixed width. Truncated labels keep their
 * tail and are prefixed with an ellipsis.
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

function isTestEnvironment(config: LoggerEnvConfig): boolean {
  // vitest may set NODE_ENV after the env was first validated
  return config.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

function buildTransportTargets(config: LoggerEnvConfig, mode: TransportMode): TransportTarget[] {
  const targets: TransportTarget[] = [];

  if (mode.console) {
    if (config.NODE_ENV === 'development') {
      targets.push({
        level: config.LOGGER_LOG_LEVEL,
        options: {
          destination: 2,
          ignore: 'pid,hostname,category,categoryLabel,service,environment',
          messageFormat: '[{categoryLabel}] {msg}',
        },
        target: 'pino-pretty',
      });
    } else {
      targets.push({
        level: config.LOGGER_LOG_LEVEL,
        options: { destination: 2 },
        target: 'pino/file',
      });
    }
  }

  if (mode.file) {
    targets.push({
      level: config.LOGGER_LOG_LEVEL,
      options: {
        destination: path.join(config.LOGGER_FILE_LOG_DIRNAME, config.LOGGER_FILE_LOG_FILENAME),
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  return targets;
}

function createRootLogger(): Logger {
  const config = loggerEnv();

  const options: pino.LoggerOptions = {
    base: {
      environment: config.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: config.LOGGER_SERVICE_NAME,
    },
    level: config.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (isTestEnvironment(config)) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino.pino(options, noopStream);
  }

  const targets = buildTransportTargets(config, currentTransportMode());
  if (targets.length === 0) {
    return pino.pino({ ...options, enabled: false });
  }

  return pino.pino({ ...options, transport: { targets } });
}

function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 22),
  });

  loggerCache.set(category, categoryLogger);
  return categoryLogger;
}

/**
 * Returns a category logger that follows transport reconfiguration.
 *
 * Modules create their loggers at import time, before the CLI has decided
 * between text and JSON output. The returned proxy resolves the underlying
 * pino child on every property access, so loggers captured early still pick
 * up `setLoggerTransports(...)`.
 */
export function getLogger(category: string): Logger {
  return new Proxy({} as Logger, {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(logger, prop, logger);
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  });
}

/**
 * Switch console/file transports at runtime. Cached loggers are dropped so the
 * next call builds a root logger with the new targets.
 */
export function setLoggerTransports(next: Partial<TransportMode>): void {
  transportMode = { ...currentTransportMode(), ...next };
  rootLogger = undefined;
  loggerCache.clear();
}

/**
 * Forget the validated environment and every cached logger. Used by tests and
 * by the CLI after it has loaded `.env`.
 */
export function resetLoggers(): void {
  env = undefined;
  transportMode = undefined;
  rootLogger = undefined;
  loggerCache.clear();
}

export function flushLoggers(): void {
  rootLogger?.flush();
}
