import { pino, type Logger, type LoggerOptions } from 'pino';

const env = process.env['NODE_ENV'];
export const isDev = env !== 'production' && env !== 'test';

function defaultLevel(): string {
  if (env === 'test') {
    return 'silent';
  }
  return isDev ? 'debug' : 'info';
}

// Pretty transport is added below for development only
const options: LoggerOptions = {
  level: process.env['BRANCHWISE_LOG_LEVEL'] ?? defaultLevel(),
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

// Only add transport in dev mode
if (isDev) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

export const logger = pino(options);

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
