import winston, { Logger, format } from 'winston';
import path from 'path';
import fs from 'fs';
import DailyRotateFile from 'winston-daily-rotate-file';

/**
 * Logger Configuration Interface
 */
interface LoggerConfig {
  logDir: string;
  logLevel: string;
  appName: string;
  environment: string;
  maxSize: number;
  maxFiles: number;
  enableConsole: boolean;
  enableFile: boolean;
  enableDailyRotate: boolean;
}

/**
 * Ensure log directory exists
 */
const ensureLogDir = (logDir: string): void => {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
};

/**
 * Custom filter to match specific log level only
 */
const createLevelFilter = (targetLevel: string) => {
  return format((info) => {
    return info.level === targetLevel ? info : false;
  })();
};

/**
 * Get default configuration with environment overrides
 */
const getConfig = (): LoggerConfig => ({
  logDir: process.env.LOG_FILE_PATH || './logs',
  logLevel: process.env.LOG_LEVEL || 'info',
  appName: process.env.APP_NAME || 'Sh-Data Renderer',
  environment: process.env.NODE_ENV || 'development',
  maxSize: parseInt(process.env.LOG_MAX_SIZE || '5242880', 10), // 5MB
  maxFiles: parseInt(process.env.LOG_MAX_FILES || '5', 10),
  enableConsole: true,
  enableFile: process.env.LOG_FILE !== 'false',
  enableDailyRotate: true,
});

/**
 * Custom format for console output with better readability
 */
const getConsoleFormat = () => {
  return format.combine(
    format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    format.colorize({ all: true }),
    format.printf(({ timestamp, level, message, service, ...meta }) => {
      const metaStr = Object.keys(meta).length ? `\n${JSON.stringify(meta, null, 2)}` : '';
      return `${timestamp} [${service}] ${level}: ${message}${metaStr}`;
    })
  );
};

/**
 * Custom format for file output with detailed context
 */
const getFileFormat = () => {
  return format.combine(
    format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    format.errors({ stack: true }),
    format.splat(),
    format.metadata({ fillExcept: ['message', 'level', 'timestamp', 'service'] }),
    format.json()
  );
};

const rotatingFile = (config: LoggerConfig, name: string, level?: string, filter?: string) =>
  new DailyRotateFile({
    filename: path.join(config.logDir, `${name}-%DATE%.log`),
    datePattern: 'YYYY-MM-DD',
    level,
    format: filter ? format.combine(createLevelFilter(filter), getFileFormat()) : getFileFormat(),
    maxSize: config.maxSize,
    maxFiles: `${config.maxFiles}d`, // e.g., '5d' = 5 days
    auditFile: path.join(config.logDir, `.${name}-audit.json`),
    zippedArchive: false,
  });

/**
 * Create Winston Logger instance
 */
const createLogger = (customConfig?: Partial<LoggerConfig>): Logger => {
  const config = { ...getConfig(), ...customConfig };
  const isDevelopment = config.environment !== 'production';

  const transports: winston.transport[] = [];

  if (config.enableConsole) {
    // In production, only log info and above; elsewhere use configured level
    const consoleLevel = config.environment === 'production' ? 'info' : config.logLevel;

    transports.push(
      new winston.transports.Console({
        level: consoleLevel,
        format:
          config.environment === 'production'
            ? format.combine(format.timestamp(), format.json())
            : getConsoleFormat(),
      })
    );
  }

  if (config.enableFile) {
    ensureLogDir(config.logDir);

    if (config.enableDailyRotate) {
      transports.push(rotatingFile(config, 'combined', 'info'), rotatingFile(config, 'error', 'error'));

      if (isDevelopment) {
        transports.push(rotatingFile(config, 'debug', 'debug', 'debug'));
      }
    } else {
      transports.push(
        new winston.transports.File({
          filename: path.join(config.logDir, 'error.log'),
          level: 'error',
          format: getFileFormat(),
          maxsize: config.maxSize,
          maxFiles: config.maxFiles,
        }),
        new winston.transports.File({
          filename: path.join(config.logDir, 'combined.log'),
          level: 'info',
          format: getFileFormat(),
          maxsize: config.maxSize,
          maxFiles: config.maxFiles,
        })
      );
    }
  }

  return winston.createLogger({
    level: config.logLevel,
    format: getFileFormat(),
    defaultMeta: {
      service: config.appName,
      environment: config.environment,
    },
    transports,
    exceptionHandlers: config.enableFile
      ? [
          new winston.transports.File({
            filename: path.join(config.logDir, 'exceptions.log'),
            format: getFileFormat(),
          }),
        ]
      : undefined,
    rejectionHandlers: config.enableFile
      ? [
          new winston.transports.File({
            filename: path.join(config.logDir, 'rejections.log'),
            format: getFileFormat(),
          }),
        ]
      : undefined,
  });
};

/**
 * Utility logging methods
 */
const loggerUtils = {
  logError: (logger: Logger, error: Error, context?: Record<string, unknown>) => {
    logger.error('Error occurred', {
      error: error.message,
      stack: error.stack,
      ...context,
    });
  },

  logRender: (
    logger: Logger,
    privateIdentity: string,
    schema: string,
    bytes: number,
    duration: number
  ) => {
    logger.debug('Sh-Data rendered', {
      privateIdentity,
      schema,
      bytes,
      duration: `${duration}ms`,
    });
  },
};

const logger = createLogger();

export default logger;
export { createLogger, loggerUtils };
export type { LoggerConfig };
