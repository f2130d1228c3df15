import { createLogger } from '@/utils/logger';

import { TaskCancelledError } from './errors';
import { SchedulingPort } from './types';

const logger = createLogger('Scheduler');

export const createDefaultScheduler = (): SchedulingPort => ({
  scheduleAfter: (delayMs, task) => {
    const timeout = setTimeout(() => {
      Promise.resolve()
        .then(task)
        .catch((error: unknown) => logger.error('Scheduled task failed', error));
    }, Math.max(0, delayMs));

    return {
      cancel: () => clearTimeout(timeout),
    };
  },
  spawn: (task) => {
    const controller = new AbortController();
    const cancelled = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(new TaskCancelledError()), {
        once: true,
      });
    });

    return {
      result: Promise.race([task(controller.signal), cancelled]),
      cancel: () => controller.abort(),
    };
  },
});

export const delay = (scheduler: SchedulingPort, ms: number) =>
  new Promise<void>((resolve) => {
    scheduler.scheduleAfter(ms, () => resolve());
  });
