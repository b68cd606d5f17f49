import pino, { type Logger, type DestinationStream } from 'pino';

const REDACT_PATHS = [
  'token',
  'apiKey',
  'password',
  'secret',
  'connectionString',
];

export function createRootLogger(
  destination?: DestinationStream,
  level: string = process.env.LOG_LEVEL || 'info',
): Logger {
  const options = {
    level,
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };
  return destination ? pino(options, destination) : pino(options);
}

const logger = createRootLogger();

export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
