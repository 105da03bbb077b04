// src/utils/logger.ts
import pino from 'pino';
import type { Logger } from 'pino';

// Determine environment
const NODE_ENV = process.env.NODE_ENV;
const isDevelopment = NODE_ENV !== 'production';

const defaultLevel = (): string => {
  if (NODE_ENV === 'test') return 'silent';
  return isDevelopment ? 'debug' : 'info';
};

const LOG_LEVEL = process.env.LOG_LEVEL || defaultLevel();

// Base logger configuration
const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,

  ...(isDevelopment ? {} : {
    timestamp: pino.stdTimeFunctions.isoTime,
  }),

  // Base context that will be included in all logs
  base: {
    pid: process.pid,
    hostname: process.env.HOSTNAME || 'localhost',
    service: 'ring-chunk',
  },

  serializers: {
    err: pino.stdSerializers.err,
  },
};

// Create the base logger
export const logger = pino(baseConfig);

// Create child loggers for different components
export const createLogger = (component: string, context?: Record<string, unknown>): Logger => {
  return logger.child({ component, ...context });
};

export const bufferLogger = createLogger('ring-buffer');
export const chunkLogger = createLogger('chunked-ring-buffer');
export const streamLogger = createLogger('chunk-emitter');

export type { Logger };
