import 'dotenv/config';
import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

//log times are always UTC
const timestamp = () => `,"time":"${new Date().toISOString()}"`;

/**
 * Root logger settings for an environment. `.env` is already loaded when the
 * central logger below reads `process.env`.
 */
export function rootLoggerOptions(env: NodeJS.ProcessEnv): LoggerOptions {
  return {
    timestamp,
    level: env.LOG_LEVEL || 'info',
    base: {
      pid: process.pid,
      hostname: env.HOSTNAME || 'localhost',
    },
    transport: env.NODE_ENV === 'development' ? {
      target: 'pino-pretty',
      options: {
        translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
        colorize: true,
      }
    } : undefined,
  };
}

//central logger to be used in all packages
const centralLogger = pino(rootLoggerOptions(process.env));

export function createLogger(context?: string): Logger {
  return context ? centralLogger.child({ context }) : centralLogger;
}

export default centralLogger;
