import pino, { type Logger } from 'pino';

const isDev = ['local', 'dev', 'development'].includes(process.env.NODE_ENV || '');

const transport = isDev
  ? pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        singleLine: false,
      },
    })
  : undefined;

const logger = pino(
  {
    name: 'stackgate',
    level: process.env.LOG_LEVEL || 'info',
  },
  transport
);

/**
 * Child logger bound to a single service, so every line carries `{ service }`.
 */
export const serviceLogger = (service: string): Logger => logger.child({ service });

export default logger;
