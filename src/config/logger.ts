import winston from 'winston';

type LogFormat = 'json' | 'simple';

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
    return `${timestamp} [${level}]: ${message} ${metaStr}`.trimEnd();
  })
);

function baseFormat(format: LogFormat): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss'
    }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    format === 'json' ? winston.format.json() : consoleFormat
  );
}

// Create the logger instance; reconfigured once the environment is validated
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: baseFormat(process.env.LOG_FORMAT === 'json' ? 'json' : 'simple'),
  defaultMeta: {
    service: 'recon-agent',
    environment: process.env.NODE_ENV || 'development'
  },
  silent: process.env.NODE_ENV === 'test' && !process.env.DEBUG_TESTS,
  transports: [new winston.transports.Console()]
});

export function configureLogger(settings: { level: string; format: LogFormat }, environment: string): void {
  logger.configure({
    level: settings.level,
    format: baseFormat(settings.format),
    defaultMeta: { service: 'recon-agent', environment },
    silent: environment === 'test' && !process.env.DEBUG_TESTS,
    transports: [new winston.transports.Console()]
  });

  // Add file transport in production
  if (environment === 'production') {
    logger.add(new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5
    }));

    logger.add(new winston.transports.File({
      filename: 'logs/combined.log',
      maxsize: 5242880, // 5MB
      maxFiles: 5
    }));
  }
}

export function componentLogger(component: string): winston.Logger {
  return logger.child({ component });
}
