import pino, { type Logger } from 'pino';
import { logLevelSchema, nodeEnvSchema, type LogLevel } from './config.js';

// Invalid values fall back here; loadConfig reports them as a ConfigError.
export function resolveLogLevel(value: string | undefined): LogLevel {
  return logLevelSchema.catch('info').parse(value);
}

export function usePrettyTransport(nodeEnv: string | undefined): boolean {
  return nodeEnvSchema.catch('development').parse(nodeEnv) === 'development';
}

export const logger = pino({
  level: resolveLogLevel(process.env.LOG_LEVEL),
  ...(usePrettyTransport(process.env.NODE_ENV)
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss.l',
            ignore: 'pid,hostname'
          }
        }
      }
    : {})
});

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
