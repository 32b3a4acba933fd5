import winston from 'winston';
import path from 'path';
import { loadConfig, PushMessagingConfig } from '../config';

// Define log format
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

// Console format for development
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
    const serviceLabel = service ? `[${String(service)}]` : '';
    const metaString = Object.keys(meta).length
      ? ` ${JSON.stringify(meta)}`
      : '';
    return `${String(timestamp)} ${level} ${serviceLabel} ${String(message)}${metaString}`;
  }),
);

/**
 * Root logger for a configuration. File logging is enabled in production when
 * `LOG_FILE_PATH` is set.
 */
export const createRootLogger = (
  config: PushMessagingConfig,
  env: NodeJS.ProcessEnv = process.env,
): winston.Logger => {
  const isProduction = config.nodeEnv === 'production';

  const root = winston.createLogger({
    level: config.logLevel,
    format: logFormat,
    defaultMeta: { service: 'push-messaging' },
    silent: config.nodeEnv === 'test' && !env.VERBOSE_TESTS,
    transports: [
      new winston.transports.Console({
        format: isProduction ? logFormat : consoleFormat,
      }),
    ],
  });

  if (isProduction && env.LOG_FILE_PATH) {
    root.add(
      new winston.transports.File({
        filename: path.resolve(env.LOG_FILE_PATH),
        maxsize: 5242880, // 5MB
        maxFiles: 5,
        tailable: true,
      }),
    );
  }

  return root;
};

const logger = createRootLogger(loadConfig());

export type Logger = winston.Logger;

export const createLogger = (service?: string): Logger => {
  return logger.child({ service });
};

export default logger;
