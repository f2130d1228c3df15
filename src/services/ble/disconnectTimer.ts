import { createLogger } from '@/utils/logger';

import { CancelHandle, SchedulingPort } from './types';

const logger = createLogger('Blind');

export interface DisconnectTimerOptions {
  scheduler: SchedulingPort;
  defaultTimeoutMs: number;
  onExpire: () => Promise<void>;
  now?: () => number;
}

export interface DisconnectTimer {
  refresh: (timeoutMs?: number, force?: boolean) => void;
  cancel: () => void;
  isArmed: () => boolean;
  getDeadline: () => number | null;
  setScheduler: (scheduler: SchedulingPort) => void;
}

export const createDisconnectTimer = ({
  scheduler: initialScheduler,
  defaultTimeoutMs,
  onExpire,
  now = Date.now,
}: DisconnectTimerOptions): DisconnectTimer => {
  let scheduler = initialScheduler;
  let armed: CancelHandle | null = null;
  let deadline: number | null = null;

  const cancel = () => {
    armed?.cancel();
    armed = null;
    deadline = null;
  };

  const refresh = (timeoutMs = defaultTimeoutMs, force = false) => {
    const candidate = now() + timeoutMs;
    // Never pull an armed deadline closer unless asked to.
    if (!force && armed && deadline !== null && deadline > candidate) {
      return;
    }

    cancel();
    logger.debug(`Disconnecting in ${timeoutMs}ms unless refreshed`);

    const handle: CancelHandle = scheduler.scheduleAfter(timeoutMs, async () => {
      if (armed !== handle) {
        return;
      }
      armed = null;
      deadline = null;
      logger.info(`Idle for ${timeoutMs}ms, disconnecting`);
      await onExpire();
    });
    armed = handle;
    deadline = candidate;
  };

  return {
    refresh,
    cancel,
    isArmed: () => armed !== null,
    getDeadline: () => deadline,
    setScheduler: (next) => {
      scheduler = next;
    },
  };
};
