// src/logger.ts
import { pino, stdSerializers, stdTimeFunctions, type Logger, type LoggerOptions } from 'pino';
import { LOG_LEVELS, type LogLevel } from './env.js';

const isDev = process.env.NODE_ENV === 'development';

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Level used before the config is loaded. An unknown LOG_LEVEL is left for
 * loadConfig to report instead of failing here at import time.
 */
export function initialLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (isLogLevel(env.LOG_LEVEL)) return env.LOG_LEVEL;
  return env.NODE_ENV === 'development' ? 'debug' : 'info';
}

export function loggerOptions(level: LogLevel, pretty = isDev): LoggerOptions {
  return {
    level,
    base: { service: process.env.APP_NAME ?? 'ai-gateway' },
    timestamp: stdTimeFunctions.isoTime, // ISO8601 timestamps
    redact: {
      paths: [
        'metadata["api-key"]',
        'metadata.authorization',
        '*.apiKey',
        '*.authorization',
        '*.secret',
        'config.auth.apiKeys',
      ],
      remove: true,
    },
    formatters: {
      level(label) {
        return { level: label }; // keep { level: 'info' }
      },
    },
    serializers: {
      err: stdSerializers.err,
      error: stdSerializers.err,
    },
    transport: pretty
      ? {
          target: 'pino-pretty',
          options: {
            ignore: 'pid,hostname',
            translateTime: 'SYS:standard',
            colorize: true,
            singleLine: false,
          },
        }
      : undefined,
  };
}

const rootLogger = pino(loggerOptions(initialLevel()));
const named = new Map<string, Logger>();

/**
 * Create a child logger with a name.
 * Usage: const log = getLogger('grpc'); log.info('booted');
 */
export function getLogger(name: string): Logger {
  const existing = named.get(name);
  if (existing) return existing;
  const child = rootLogger.child({ name });
  named.set(name, child);
  return child;
}

/** Apply the validated LOG_LEVEL to the root and every named logger. */
export function setLogLevel(level: LogLevel): void {
  rootLogger.level = level;
  for (const child of named.values()) child.level = level;
}
