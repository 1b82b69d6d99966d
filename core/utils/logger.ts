import winston from 'winston';
import { loggingConfig } from '@core/config/logging';
import type { LoggerServiceName } from '@core/config/logging';

/**
 * Interface for the LoggerFactory
 */
export interface ILoggerFactory {
  createServiceLogger(serviceName: LoggerServiceName): winston.Logger;
}

winston.addColors(loggingConfig.colors);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    let msg = `${String(timestamp)} [${level}]${service ? ` [${String(service)}]` : ''} ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      msg += '\n' + JSON.stringify(metadata, null, 2);
    }
    return msg;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.json()
);

/**
 * LOG_LEVEL wins, then the test defaults, then QUIRE_DEBUG, then `fallback`.
 */
function resolveLogLevel(fallback: string): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  if (process.env.NODE_ENV === 'test') {
    return process.env.TEST_LOG_LEVEL || 'error';
  }

  if (process.env.QUIRE_DEBUG === 'true') {
    return 'debug';
  }

  return fallback;
}

function createTransports(level: string): winston.transport[] {
  const transports: winston.transport[] = [];

  // No console output while testing unless a level was asked for explicitly
  if (process.env.NODE_ENV !== 'test' || process.env.TEST_LOG_LEVEL) {
    transports.push(new winston.transports.Console({ format: consoleFormat, level }));
  }

  if (process.env.QUIRE_LOG_FILE) {
    transports.push(new winston.transports.File({
      filename: process.env.QUIRE_LOG_FILE,
      format: fileFormat,
      level
    }));
  }

  return transports;
}

/**
 * Factory service for creating Winston loggers
 */
export class LoggerFactory implements ILoggerFactory {
  private readonly loggers = new Map<LoggerServiceName, winston.Logger>();

  /**
   * Loggers are cached per service, so every module asking for `layout`
   * shares one instance and one level.
   */
  createServiceLogger(serviceName: LoggerServiceName): winston.Logger {
    const existing = this.loggers.get(serviceName);
    if (existing) {
      return existing;
    }

    const level = resolveLogLevel(loggingConfig.services[serviceName].level);
    const transports = createTransports(level);
    const logger = winston.createLogger({
      level,
      levels: loggingConfig.levels,
      defaultMeta: { service: serviceName },
      transports,
      silent: transports.length === 0
    });

    this.loggers.set(serviceName, logger);
    return logger;
  }

  /** Applies a level to every logger created so far and to their transports. */
  setLevel(level: string): void {
    for (const logger of this.loggers.values()) {
      logger.level = level;
      logger.transports.forEach(transport => {
        transport.level = level;
      });
    }
  }
}

export const loggerFactory = new LoggerFactory();

export function createServiceLogger(serviceName: LoggerServiceName): winston.Logger {
  return loggerFactory.createServiceLogger(serviceName);
}

export const modelLogger = createServiceLogger('model');
export const layoutLogger = createServiceLogger('layout');
export const configLogger = createServiceLogger('config');
