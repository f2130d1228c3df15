import { appConfig, LogLevel } from '@/config/appConfig';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
}

export const createLogger = (context: string, level: LogLevel = appConfig.logLevel): Logger => {
  const prefix = `[${context}]`;
  const enabled = (target: LogLevel) => LEVEL_RANK[target] >= LEVEL_RANK[level];

  return {
    debug: (message, ...details) => {
      if (enabled('debug')) {
        console.debug(prefix, message, ...details);
      }
    },
    info: (message, ...details) => {
      if (enabled('info')) {
        console.info(prefix, message, ...details);
      }
    },
    warn: (message, ...details) => {
      if (enabled('warn')) {
        console.warn(prefix, message, ...details);
      }
    },
    error: (message, ...details) => {
      if (enabled('error')) {
        console.error(prefix, message, ...details);
      }
    },
  };
};
