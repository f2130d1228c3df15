import { appConfig, DeviceSettings } from '@/config/appConfig';
import { SPEED_LEVELS } from '@/constants/commands';
import { BlindDeviceStore, createBlindDeviceStore } from '@/state/deviceStore';
import {
  ConnectionState,
  ConnectOptions,
  EndPositionInfo,
  MovementOptions,
  NotificationEvent,
  PeripheralIdentity,
  SpeedLevel,
} from '@/types/blind';
import { bytesToHex, hexToBytes } from '@/utils/hex';
import { createLogger } from '@/utils/logger';

import { CommandDispatcher, createCommandDispatcher } from './commandDispatcher';
import {
  angleFrame,
  CommandFrame,
  percentFrame,
  simpleFrame,
  speedFrame,
  tiltPercentToAngle,
} from './commandFrames';
import { ConnectionCoordinator, createConnectionCoordinator } from './connectionCoordinator';
import { createDisconnectTimer, DisconnectTimer } from './disconnectTimer';
import { describeError } from './errors';
import { checkEndPositions, checkFavoritePosition, GuardResult } from './guards';
import { decodeNotification } from './notificationDecoder';
import { createDefaultScheduler, delay } from './scheduler';
import { BlindDeviceHandlers, CryptoPort, SchedulingPort, TransportPort } from './types';

export interface BlindDeviceOptions<THandle> {
  peripheral: PeripheralIdentity;
  transport: TransportPort<THandle>;
  crypto: CryptoPort;
  scheduler?: SchedulingPort;
  settings?: Partial<DeviceSettings>;
  now?: () => number;
}

export interface BlindDevice {
  readonly store: BlindDeviceStore;
  getName: () => string;
  connect: (options?: ConnectOptions) => Promise<boolean>;
  disconnect: () => Promise<void>;
  isConnected: () => boolean;
  getConnectionState: () => ConnectionState;
  getEndPositions: () => EndPositionInfo | null;
  refreshDisconnectTimer: (timeoutMs?: number, force?: boolean) => void;
  open: (options?: MovementOptions) => Promise<boolean>;
  close: (options?: MovementOptions) => Promise<boolean>;
  stop: (options?: MovementOptions) => Promise<boolean>;
  setPosition: (percent: number, options?: MovementOptions) => Promise<boolean>;
  setTilt: (percent: number, options?: MovementOptions) => Promise<boolean>;
  openTilt: (options?: MovementOptions) => Promise<boolean>;
  closeTilt: (options?: MovementOptions) => Promise<boolean>;
  favorite: () => Promise<boolean>;
  setSpeed: (level: SpeedLevel) => Promise<boolean>;
  statusQuery: () => Promise<boolean>;
  userQuery: () => Promise<boolean>;
  pointSetQuery: () => Promise<boolean>;
  setKey: () => Promise<boolean>;
  onPosition: (callback: BlindDeviceHandlers['onPosition']) => void;
  onRunning: (callback: BlindDeviceHandlers['onRunning']) => void;
  onStatus: (callback: BlindDeviceHandlers['onStatus']) => void;
  onConnection: (callback: BlindDeviceHandlers['onConnection']) => void;
  setPeripheral: (peripheral: PeripheralIdentity) => void;
  setScheduler: (scheduler: SchedulingPort) => void;
}

const assertPercent = (value: number, label: string) => {
  if (!Number.isInteger(value) || value < 0 || value > 100) {
    throw new RangeError(`${label} must be an integer between 0 and 100, got ${value}`);
  }
};

export const createBlindDevice = <THandle>({
  peripheral: initialPeripheral,
  transport,
  crypto,
  scheduler: initialScheduler = createDefaultScheduler(),
  settings = {},
  now = Date.now,
}: BlindDeviceOptions<THandle>): BlindDevice => {
  const config: DeviceSettings = {
    disconnectTimeMs: settings.disconnectTimeMs ?? appConfig.disconnectTimeMs,
    maxCommandAttempts: settings.maxCommandAttempts ?? appConfig.maxCommandAttempts,
    notificationDelayMs: settings.notificationDelayMs ?? appConfig.notificationDelayMs,
    emitRunningEvents: settings.emitRunningEvents ?? appConfig.emitRunningEvents,
  };
  const logger = createLogger('Blind');
  const store = createBlindDeviceStore(now);
  const handlers: BlindDeviceHandlers = {};
  let peripheral = initialPeripheral;
  let scheduler = initialScheduler;

  const getName = () => peripheral.name ?? peripheral.address;

  const applyEvent = (event: NotificationEvent) => {
    switch (event.type) {
      case 'position': {
        const { positionPercent, tiltPercent, endPositions } = event;
        store.getState().applyPosition({ positionPercent, tiltPercent, endPositions });
        handlers.onPosition?.({ positionPercent, tiltPercent, endPositions });
        break;
      }
      case 'running':
        if (config.emitRunningEvents) {
          handlers.onRunning?.(event.opening);
        } else {
          logger.debug(`Running notification (opening: ${event.opening})`);
        }
        break;
      case 'status': {
        const { positionPercent, tiltPercent, batteryPercent, speedLevel, endPositions } = event;
        const status = { positionPercent, tiltPercent, batteryPercent, speedLevel, endPositions };
        store.getState().applyStatus(status);
        handlers.onStatus?.(status);
        break;
      }
      default:
        break;
    }
  };

  const handleNotification = (bytes: Uint8Array) => {
    let frame: Uint8Array;
    try {
      frame = hexToBytes(crypto.decrypt(bytesToHex(bytes)));
    } catch (error) {
      logger.error(`Failed to decrypt notification from ${getName()}`, describeError(error));
      return;
    }

    logger.debug('Received notification', bytesToHex(frame));
    const event = decodeNotification(frame);
    if (event) {
      applyEvent(event);
    }
  };

  const timer: DisconnectTimer = createDisconnectTimer({
    scheduler,
    defaultTimeoutMs: config.disconnectTimeMs,
    onExpire: () => coordinator.disconnect(),
    now,
  });

  const coordinator: ConnectionCoordinator<THandle> = createConnectionCoordinator({
    transport,
    scheduler,
    timer,
    getPeripheral: () => peripheral,
    onStateChange: (state) => {
      store.getState().setConnectionState(state);
      handlers.onConnection?.(state);
    },
    onNotification: handleNotification,
    initialize: async ({ useNotificationDelay = false }) => {
      await dispatcher.send(simpleFrame('setKey'));
      if (useNotificationDelay) {
        await delay(scheduler, config.notificationDelayMs);
      }
      await dispatcher.send(simpleFrame('statusQuery'));
    },
    logger,
  });

  const dispatcher: CommandDispatcher = createCommandDispatcher({
    transport,
    crypto,
    getHandle: coordinator.getHandle,
    maxAttempts: config.maxCommandAttempts,
    onExhausted: coordinator.releaseConnection,
    logger,
  });

  const run = async (frame: CommandFrame, guard?: () => GuardResult) => {
    const verdict = guard?.();
    if (verdict && !verdict.ok) {
      throw verdict.error;
    }

    if (!(await coordinator.ensureReady())) {
      return false;
    }
    return dispatcher.send(frame);
  };

  const endPositionGuard =
    ({ ignoreEndPositions = false }: MovementOptions = {}) =>
    () =>
      checkEndPositions(store.getState().endPositions, getName(), ignoreEndPositions);

  return {
    store,
    getName,
    connect: (options) => coordinator.ensureReady(options),
    disconnect: coordinator.disconnect,
    isConnected: coordinator.isConnected,
    getConnectionState: coordinator.getState,
    getEndPositions: () => store.getState().endPositions,
    refreshDisconnectTimer: timer.refresh,
    open: (options) => run(simpleFrame('open'), endPositionGuard(options)),
    close: (options) => run(simpleFrame('close'), endPositionGuard(options)),
    stop: (options) => run(simpleFrame('stop'), endPositionGuard(options)),
    setPosition: async (percent, options) => {
      assertPercent(percent, 'Position');
      return run(percentFrame(percent), endPositionGuard(options));
    },
    setTilt: async (percent, options) => {
      assertPercent(percent, 'Tilt');
      return run(angleFrame(tiltPercentToAngle(percent)), endPositionGuard(options));
    },
    openTilt: (options) => run(angleFrame(0), endPositionGuard(options)),
    closeTilt: (options) => run(angleFrame(tiltPercentToAngle(100)), endPositionGuard(options)),
    favorite: () =>
      run(simpleFrame('favorite'), () =>
        checkFavoritePosition(store.getState().endPositions, getName()),
      ),
    setSpeed: async (level) => {
      if (!SPEED_LEVELS.includes(level)) {
        throw new RangeError(`Unknown speed level ${level}`);
      }
      return run(speedFrame(level));
    },
    statusQuery: () => run(simpleFrame('statusQuery')),
    userQuery: () => run(simpleFrame('userQuery')),
    pointSetQuery: () => run(simpleFrame('pointSetQuery')),
    setKey: () => run(simpleFrame('setKey')),
    onPosition: (callback) => {
      handlers.onPosition = callback;
    },
    onRunning: (callback) => {
      handlers.onRunning = callback;
    },
    onStatus: (callback) => {
      handlers.onStatus = callback;
    },
    onConnection: (callback) => {
      handlers.onConnection = callback;
    },
    setPeripheral: (next) => {
      peripheral = next;
    },
    setScheduler: (next) => {
      scheduler = next;
      timer.setScheduler(next);
      coordinator.setScheduler(next);
    },
  };
};
