import noble from '@abandonware/noble';
import type { Characteristic, Peripheral } from '@abandonware/noble';

import { appConfig } from '@/config/appConfig';
import { blindProfile } from '@/config/blindProfile';
import { PeripheralIdentity } from '@/types/blind';
import { createLogger } from '@/utils/logger';

import {
  BlindError,
  ConnectionSlotsExhaustedError,
  describeError,
  DeviceNotFoundError,
  TransientTransportError,
} from './errors';
import { TransportPort } from './types';

const logger = createLogger('Noble');

export interface NobleHandle {
  peripheral: Peripheral;
  characteristics: Map<string, Characteristic>;
  closing: boolean;
}

export interface NobleTransportOptions {
  scanTimeoutMs?: number;
  maxConnectAttempts?: number;
}

// HCI statuses 0x07 and 0x09 as noble reports them.
const CONNECTION_LIMIT_ERRORS = /memory capacity exceeded|connection limit exceeded/i;

const isConnectionLimitError = (error: unknown) =>
  error instanceof Error && CONNECTION_LIMIT_ERRORS.test(error.message);

const normalizeUuid = (uuid: string) => uuid.replace(/-/g, '').toLowerCase();

const normalizeAddress = (address: string) => address.replace(/[:-]/g, '').toLowerCase();

const matchesIdentity = (peripheral: Peripheral, identity: PeripheralIdentity) => {
  const target = normalizeAddress(identity.address);
  return normalizeAddress(peripheral.address) === target || normalizeAddress(peripheral.id) === target;
};

const waitForPoweredOn = (timeoutMs: number) =>
  new Promise<void>((resolve, reject) => {
    if (noble.state === 'poweredOn') {
      resolve();
      return;
    }

    const onStateChange = (state: string) => {
      if (state !== 'poweredOn') {
        return;
      }
      clearTimeout(timeout);
      noble.removeListener('stateChange', onStateChange);
      resolve();
    };

    const timeout = setTimeout(() => {
      noble.removeListener('stateChange', onStateChange);
      reject(new TransientTransportError(`Bluetooth adapter not ready (state: ${noble.state})`));
    }, timeoutMs);

    noble.on('stateChange', onStateChange);
  });

const findPeripheral = (identity: PeripheralIdentity, timeoutMs: number) =>
  new Promise<Peripheral>((resolve, reject) => {
    const finish = () => {
      clearTimeout(timeout);
      noble.removeListener('discover', onDiscover);
      noble.stopScanningAsync().catch((error: unknown) => {
        logger.warn('Failed to stop scanning', describeError(error));
      });
    };

    const onDiscover = (peripheral: Peripheral) => {
      if (!matchesIdentity(peripheral, identity)) {
        return;
      }
      finish();
      resolve(peripheral);
    };

    const timeout = setTimeout(() => {
      finish();
      reject(new DeviceNotFoundError(identity.address));
    }, timeoutMs);

    noble.on('discover', onDiscover);
    noble.startScanningAsync([], false).catch((error: unknown) => {
      finish();
      reject(new TransientTransportError('Failed to start scanning', { cause: error }));
    });
  });

const requireCharacteristic = (handle: NobleHandle, uuid: string) => {
  const characteristic = handle.characteristics.get(normalizeUuid(uuid));
  if (!characteristic) {
    throw new BlindError(`Characteristic ${uuid} not found on ${handle.peripheral.address}`);
  }
  return characteristic;
};

export const createNobleTransport = ({
  scanTimeoutMs = appConfig.scanTimeoutMs,
  maxConnectAttempts = appConfig.maxConnectAttempts,
}: NobleTransportOptions = {}): TransportPort<NobleHandle> => ({
  connect: async (identity) => {
    await waitForPoweredOn(scanTimeoutMs);
    logger.info(`Scanning for ${identity.address}`);
    const peripheral = await findPeripheral(identity, scanTimeoutMs);

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= maxConnectAttempts; attempt += 1) {
      try {
        await peripheral.connectAsync();
        const { characteristics } = await peripheral.discoverSomeServicesAndCharacteristicsAsync(
          [normalizeUuid(blindProfile.serviceUuid)],
          [
            normalizeUuid(blindProfile.notificationCharacteristicUuid),
            normalizeUuid(blindProfile.commandCharacteristicUuid),
          ],
        );

        return {
          peripheral,
          characteristics: new Map(
            characteristics.map((characteristic): [string, Characteristic] => [
              normalizeUuid(characteristic.uuid),
              characteristic,
            ]),
          ),
          closing: false,
        };
      } catch (error) {
        if (isConnectionLimitError(error)) {
          throw new ConnectionSlotsExhaustedError(identity.address, { cause: error });
        }
        lastError = error;
        logger.warn(
          `Connect attempt ${attempt}/${maxConnectAttempts} to ${identity.address} failed`,
          describeError(error),
        );
        if (peripheral.state === 'connected') {
          await peripheral.disconnectAsync().catch((disconnectError: unknown) => {
            logger.warn('Failed to reset connection', describeError(disconnectError));
          });
        }
      }
    }

    throw new TransientTransportError(`Could not connect to ${identity.address}`, {
      cause: lastError,
    });
  },
  subscribe: async (handle, characteristicUuid, onNotify) => {
    const characteristic = requireCharacteristic(handle, characteristicUuid);
    characteristic.on('data', (data: Buffer) => onNotify(new Uint8Array(data)));
    await characteristic.subscribeAsync();
  },
  write: async (handle, characteristicUuid, bytes, { ack }) => {
    const characteristic = requireCharacteristic(handle, characteristicUuid);
    try {
      await characteristic.writeAsync(Buffer.from(bytes), !ack);
    } catch (error) {
      throw new TransientTransportError(`Write to ${characteristicUuid} failed`, { cause: error });
    }
  },
  disconnect: async (handle) => {
    handle.closing = true;
    await handle.peripheral.disconnectAsync();
  },
  isConnected: (handle) => handle.peripheral.state === 'connected',
  onUnsolicitedDisconnect: (handle, callback) => {
    handle.peripheral.once('disconnect', () => {
      if (!handle.closing) {
        callback();
      }
    });
  },
});
