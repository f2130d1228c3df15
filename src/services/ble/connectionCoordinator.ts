import { blindProfile } from '@/config/blindProfile';
import { ConnectOptions, ConnectionState, PeripheralIdentity } from '@/types/blind';
import { Logger } from '@/utils/logger';

import { DisconnectTimer } from './disconnectTimer';
import { describeError, TaskCancelledError } from './errors';
import { SchedulingPort, SpawnedTask, TransportPort } from './types';

export interface ConnectionCoordinatorOptions<THandle> {
  transport: TransportPort<THandle>;
  scheduler: SchedulingPort;
  timer: DisconnectTimer;
  getPeripheral: () => PeripheralIdentity;
  onStateChange: (state: ConnectionState) => void;
  onNotification: (bytes: Uint8Array) => void;
  initialize: (options: ConnectOptions) => Promise<void>;
  logger: Logger;
}

export interface ConnectionCoordinator<THandle> {
  ensureReady: (options?: ConnectOptions) => Promise<boolean>;
  disconnect: () => Promise<void>;
  releaseConnection: (target: THandle) => Promise<void>;
  isConnected: () => boolean;
  getHandle: () => THandle | null;
  getState: () => ConnectionState;
  setScheduler: (scheduler: SchedulingPort) => void;
}

export const createConnectionCoordinator = <THandle>({
  transport,
  scheduler: initialScheduler,
  timer,
  getPeripheral,
  onStateChange,
  onNotification,
  initialize,
  logger,
}: ConnectionCoordinatorOptions<THandle>): ConnectionCoordinator<THandle> => {
  let scheduler = initialScheduler;
  let state: ConnectionState = 'disconnected';
  let handle: THandle | null = null;
  let attempt: SpawnedTask<boolean> | null = null;
  let callerSequence = 0;

  const setState = (next: ConnectionState) => {
    if (next === state) {
      return;
    }
    state = next;
    onStateChange(next);
  };

  const isConnected = () => handle !== null && transport.isConnected(handle);

  const releaseHandle = async (target: THandle) => {
    try {
      await transport.disconnect(target);
    } catch (error) {
      logger.warn('Failed to release connection', describeError(error));
    }
  };

  const handlePeerDisconnect = (target: THandle) => {
    if (handle !== target) {
      return;
    }
    logger.info(`${getPeripheral().address} disconnected`);
    timer.cancel();
    handle = null;
    setState('disconnected');
  };

  const superseded = (signal: AbortSignal, connected: THandle) =>
    signal.aborted || handle !== connected;

  const establish = async (options: ConnectOptions, signal: AbortSignal) => {
    const peripheral = getPeripheral();
    if (handle !== null) {
      const stale = handle;
      handle = null;
      await releaseHandle(stale);
    }
    setState('connecting');
    logger.info(`Connecting to ${peripheral.address}`);

    const connected = await transport.connect(peripheral);
    if (signal.aborted) {
      await releaseHandle(connected);
      return false;
    }

    handle = connected;
    try {
      transport.onUnsolicitedDisconnect(connected, () => handlePeerDisconnect(connected));
      await transport.subscribe(
        connected,
        blindProfile.notificationCharacteristicUuid,
        onNotification,
      );
      if (superseded(signal, connected)) {
        return false;
      }

      await initialize(options);
      if (superseded(signal, connected)) {
        return false;
      }
    } catch (error) {
      if (handle === connected) {
        handle = null;
        await releaseHandle(connected);
      }
      throw error;
    }

    logger.info(`Connected to ${peripheral.address}`);
    setState('connected');
    timer.refresh();
    return true;
  };

  const ensureReady = async (options: ConnectOptions = {}) => {
    if (state === 'connected' && isConnected()) {
      timer.refresh();
      return true;
    }

    callerSequence += 1;
    const token = callerSequence;
    if (!attempt) {
      logger.debug('First caller, starting connection');
      attempt = scheduler.spawn((signal) => establish(options, signal));
    } else {
      logger.debug('Connection already in progress, waiting');
    }

    const current = attempt;
    const settle = () => {
      if (attempt === current) {
        attempt = null;
      }
    };
    // A newer attempt owns the state once this one has been superseded.
    const ownsState = () => attempt === current || attempt === null;

    let ready: boolean;
    try {
      ready = await current.result;
    } catch (error) {
      const stillOwner = ownsState();
      settle();
      if (error instanceof TaskCancelledError) {
        logger.info('Connection attempt cancelled');
        if (stillOwner) {
          setState('disconnected');
        }
        return false;
      }

      if (stillOwner) {
        setState('disconnected');
      }
      throw error;
    }

    settle();
    if (!ready) {
      return false;
    }
    // First caller connects, the last caller's command goes through.
    return token === callerSequence;
  };

  const disconnect = async () => {
    if (!attempt && handle === null) {
      timer.cancel();
      setState('disconnected');
      return;
    }

    setState('disconnecting');
    timer.cancel();

    if (attempt) {
      logger.info(`Cancelling connection to ${getPeripheral().address}`);
      attempt.cancel();
      attempt = null;
    }

    const target = handle;
    handle = null;
    try {
      if (target !== null) {
        logger.info(`Disconnecting ${getPeripheral().address}`);
        await transport.disconnect(target);
      }
    } finally {
      // A caller may have reconnected while the link was torn down.
      if (!attempt && handle === null) {
        setState('disconnected');
      }
    }
  };

  // Drops a link that stopped accepting writes. An attempt initializing on it fails with the write error.
  const releaseConnection = async (target: THandle) => {
    if (handle !== target) {
      return;
    }

    logger.info(`Dropping connection to ${getPeripheral().address}`);
    handle = null;
    timer.cancel();
    if (!attempt) {
      setState('disconnecting');
    }
    await releaseHandle(target);
    if (!attempt && handle === null) {
      setState('disconnected');
    }
  };

  return {
    ensureReady,
    disconnect,
    releaseConnection,
    isConnected,
    getHandle: () => handle,
    getState: () => state,
    setScheduler: (next) => {
      scheduler = next;
    },
  };
};
