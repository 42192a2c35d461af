/**
 * Subsystem Logging
 *
 * Structured, per-subsystem loggers built on tslog. The terminal belongs to the
 * display while the monitor runs, so records never go to the console; they are
 * appended as JSON lines to a log file once one is configured.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { Logger, type ILogObj } from 'tslog';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogMeta = Record<string, unknown>;

export interface LoggingSettings {
  /** Minimum level that reaches the sink */
  level: LogLevel;
  /** JSON-lines log file; no file sink when unset */
  file?: string;
}

export interface SubsystemLogger {
  readonly subsystem: string;
  trace(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  fatal(message: string, meta?: LogMeta): void;
  child(name: string): SubsystemLogger;
}

// tslog numbers its levels silly=0 .. fatal=6
const TSLOG_LEVEL_IDS: Record<LogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

let settings: LoggingSettings = { level: 'info' };
let root = buildRootLogger(settings);
const subLoggers = new Map<string, Logger<ILogObj>>();

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Replaces the logging settings. Loggers handed out earlier pick up the new
 * sink and level on their next call.
 */
export function configureLogging(next: Partial<LoggingSettings>): void {
  settings = { ...settings, ...next };
  root = buildRootLogger(settings);
  subLoggers.clear();
}

export function getLoggingSettings(): LoggingSettings {
  return { ...settings };
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const emit = (level: LogLevel, message: string, meta?: LogMeta): void => {
    const logger = subLoggerFor(subsystem);
    if (meta) {
      logger[level](message, meta);
    } else {
      logger[level](message);
    }
  };

  return {
    subsystem,
    trace: (message, meta) => emit('trace', message, meta),
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
    fatal: (message, meta) => emit('fatal', message, meta),
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`),
  };
}

function subLoggerFor(subsystem: string): Logger<ILogObj> {
  let logger = subLoggers.get(subsystem);
  if (!logger) {
    logger = root.getSubLogger({ name: subsystem });
    subLoggers.set(subsystem, logger);
  }
  return logger;
}

function buildRootLogger(current: LoggingSettings): Logger<ILogObj> {
  const logger = new Logger<ILogObj>({
    name: 'sysfs-monitor',
    type: 'hidden',
    minLevel: TSLOG_LEVEL_IDS[current.level],
  });

  const file = current.file;
  if (file) {
    let sinkFailed = false;
    let directoryReady = false;
    logger.attachTransport((logObj) => {
      if (sinkFailed) {
        return;
      }
      try {
        if (!directoryReady) {
          mkdirSync(dirname(file), { recursive: true });
          directoryReady = true;
        }
        appendFileSync(file, `${JSON.stringify(logObj)}\n`, 'utf8');
      } catch (error) {
        sinkFailed = true;
        process.stderr.write(`sysfs-monitor: log file ${file} disabled: ${String(error)}\n`);
      }
    });
  }

  return logger;
}
