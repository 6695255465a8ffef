import pino, { type LoggerOptions } from 'pino';

const isProduction = process.env['NODE_ENV'] === 'production';
const isInteractive = process.stderr.isTTY === true && process.env['NODE_ENV'] !== 'test';

// Level from GATE_AUDIT_LOG_LEVEL, otherwise by environment
const options: LoggerOptions = {
  level: process.env['GATE_AUDIT_LOG_LEVEL'] ?? (isProduction ? 'info' : 'debug'),
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

// Stdout carries command output, so logs always go to stderr
let logger: pino.Logger;
if (!isProduction && isInteractive) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: 2,
    },
  };
  logger = pino(options);
} else {
  logger = pino(options, pino.destination(2));
}

export { logger };

export function createLogger(module: string): pino.Logger {
  return logger.child({ module });
}
