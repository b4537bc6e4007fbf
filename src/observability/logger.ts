import pino from 'pino';
import type { LogContext } from './types.js';

/** Structured logger interface for Conclave. */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  level?: string;
  name?: string;
  /** Also write JSON lines to this file. Defaults to LOG_FILE. Only the first logger created decides. */
  file?: string;
}

const REDACT_PATHS = [
  'apiKey',
  'authorization',
  'password',
  'secret',
  'token',
  '*.apiKey',
  '*.authorization',
  '*.password',
  '*.secret',
  '*.token',
];

// Targets pass everything; each component logger filters by its own level
const TARGET_LEVEL = 'trace';

function buildTransport(file: string | undefined): pino.TransportMultiOptions | undefined {
  const pretty = process.env['NODE_ENV'] === 'development';
  if (!pretty && !file) return undefined;

  const targets: pino.TransportTargetOptions[] = [
    pretty
      ? { target: 'pino-pretty', level: TARGET_LEVEL, options: { colorize: true } }
      : { target: 'pino/file', level: TARGET_LEVEL, options: { destination: 1 } },
  ];
  if (file) {
    targets.push({ target: 'pino/file', level: TARGET_LEVEL, options: { destination: file, mkdir: true } });
  }
  return { targets };
}

/** Adapt pino's (object, message) call order to the (message, context) order used across the codebase. */
function wrap(instance: pino.Logger): Logger {
  return {
    debug: (msg, context) => instance.debug(context ?? {}, msg),
    info: (msg, context) => instance.info(context ?? {}, msg),
    warn: (msg, context) => instance.warn(context ?? {}, msg),
    error: (msg, context) => instance.error(context ?? {}, msg),
    fatal: (msg, context) => instance.fatal(context ?? {}, msg),
    child: (bindings) => wrap(instance.child(bindings)),
  };
}

let root: pino.Logger | undefined;

/** One pino instance (and transport worker) per process, built by the first caller. */
function rootLogger(file: string | undefined): pino.Logger {
  if (!root) {
    root = pino({
      level: TARGET_LEVEL,
      transport: buildTransport(file),
      serializers: {
        err: pino.stdSerializers.err,
      },
      redact: {
        paths: REDACT_PATHS,
        censor: '[REDACTED]',
      },
    });
  }
  return root;
}

/**
 * Create a named logger. Every logger shares the process-wide pino instance,
 * so the destination (`file`, `LOG_FILE`, `NODE_ENV`) is fixed by the first
 * call; `level` applies per logger.
 */
export function createLogger(options?: LoggerOptions): Logger {
  const level = options?.level ?? process.env['LOG_LEVEL'] ?? 'info';
  const file = options?.file ?? process.env['LOG_FILE'];
  return wrap(rootLogger(file).child({ name: options?.name ?? 'conclave' }, { level }));
}
