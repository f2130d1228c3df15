export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const parseBoolean = (value: string | undefined, fallback: boolean) => {
  if (value === undefined) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }

  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return fallback;
};

const parseNumber = (value: string | undefined, fallback: number) => {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parseLogLevel = (value: string | undefined, fallback: LogLevel): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
};

export interface DeviceSettings {
  disconnectTimeMs: number;
  maxCommandAttempts: number;
  notificationDelayMs: number;
  emitRunningEvents: boolean;
}

export interface AppConfig extends DeviceSettings {
  maxConnectAttempts: number;
  scanTimeoutMs: number;
  logLevel: LogLevel;
  cryptKey: string | null;
}

export const appConfig: AppConfig = {
  disconnectTimeMs: parseNumber(process.env.BLIND_DISCONNECT_TIME_MS, 15000),
  maxCommandAttempts: parseNumber(process.env.BLIND_MAX_COMMAND_ATTEMPTS, 5),
  maxConnectAttempts: parseNumber(process.env.BLIND_MAX_CONNECT_ATTEMPTS, 5),
  notificationDelayMs: parseNumber(process.env.BLIND_NOTIFICATION_DELAY_MS, 500),
  scanTimeoutMs: parseNumber(process.env.BLIND_SCAN_TIMEOUT_MS, 10000),
  emitRunningEvents: parseBoolean(process.env.BLIND_EMIT_RUNNING_EVENTS, false),
  logLevel: parseLogLevel(process.env.BLIND_LOG_LEVEL, 'warn'),
  cryptKey: process.env.BLIND_CRYPT_KEY ?? null,
};
