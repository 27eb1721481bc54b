import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';

type LogMeta = Record<string, unknown>;

const logLevel = process.env.LOG_LEVEL || 'info';
const logDir = process.env.LOG_DIR;
const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

const SECRET_KEY_PATTERN = /password|token|secret|api[-_]?key|authorization|cookie/i;

/** Replaces values under secret-looking keys, at any depth. */
export function redactSecrets(data: LogMeta): LogMeta {
  const redacted: LogMeta = {};
  for (const [key, value] of Object.entries(data)) {
    if (SECRET_KEY_PATTERN.test(key)) {
      redacted[key] = '[REDACTED]';
    } else if (value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Error)) {
      redacted[key] = redactSecrets(Object.fromEntries(Object.entries(value)));
    } else {
      redacted[key] = value;
    }
  }
  return redacted;
}

const redaction = winston.format((info) => {
  for (const key of Object.keys(info)) {
    const value: unknown = info[key];
    if (SECRET_KEY_PATTERN.test(key)) {
      info[key] = '[REDACTED]';
    } else if (value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Error)) {
      info[key] = redactSecrets(Object.fromEntries(Object.entries(value)));
    }
  }
  return info;
});

// Console format for development
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
    const scope = typeof component === 'string' ? ` (${component})` : '';
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
    return `${timestamp} [${level}]${scope}: ${message} ${metaStr}`;
  })
);

// JSON for files, one object per line
const fileFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: consoleFormat,
    silent: isTest,
  }),
];

if (logDir && !isTest) {
  transports.push(
    new DailyRotateFile({
      filename: path.join(logDir, 'engine-error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxFiles: '30d',
      maxSize: '20m',
      zippedArchive: isProduction,
      format: fileFormat,
    }),
    new DailyRotateFile({
      filename: path.join(logDir, 'engine-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      maxFiles: '14d',
      maxSize: '20m',
      zippedArchive: isProduction,
      format: fileFormat,
    })
  );
}

const logger = winston.createLogger({
  level: logLevel,
  // Backend credentials must never reach a production log.
  format: isProduction ? redaction() : winston.format.splat(),
  defaultMeta: {
    service: 'generation-engine',
    environment: process.env.NODE_ENV || 'development',
  },
  transports,
});

export default logger;

/** Child logger tagging every line with the component that wrote it. */
export function componentLogger(component: string): winston.Logger {
  return logger.child({ component });
}

export const logError = (error: unknown, context?: LogMeta) => {
  const err = error instanceof Error ? error : new Error(String(error));
  logger.error('Engine Error', {
    errorName: err.name,
    message: err.message,
    stack: err.stack,
    ...context,
  });
};

export const logEngine = (action: string, details: LogMeta) => {
  logger.info('Engine Operation', {
    action,
    ...details,
  });
};
