import { beforeEach, describe, expect, it, vi } from 'vitest';

import { blindProfile } from '@/config/blindProfile';
import {
  ConnectionSlotsExhaustedError,
  DeviceNotFoundError,
  TransientTransportError,
} from '@/services/ble/errors';
import { createNobleTransport } from '@/services/ble/nobleTransport';

type Listener = (...args: unknown[]) => void;

const radio = vi.hoisted(() => {
  const listeners = new Map<string, Set<Listener>>();
  return {
    listeners,
    emit: (event: string, ...args: unknown[]) => {
      listeners.get(event)?.forEach((listener) => listener(...args));
    },
    startScanningAsync: vi.fn(async () => undefined),
    stopScanningAsync: vi.fn(async () => undefined),
  };
});

vi.mock('@abandonware/noble', () => ({
  default: {
    state: 'poweredOn',
    on: (event: string, listener: Listener) => {
      const registered = radio.listeners.get(event) ?? new Set<Listener>();
      registered.add(listener);
      radio.listeners.set(event, registered);
    },
    removeListener: (event: string, listener: Listener) => {
      radio.listeners.get(event)?.delete(listener);
    },
    startScanningAsync: radio.startScanningAsync,
    stopScanningAsync: radio.stopScanningAsync,
  },
}));

const compactUuid = (uuid: string) => uuid.replace(/-/g, '');

const createFakeCharacteristic = (uuid: string) => {
  const dataListeners: Array<(data: Buffer) => void> = [];
  return {
    uuid: compactUuid(uuid),
    dataListeners,
    on: vi.fn((_event: string, listener: (data: Buffer) => void) => {
      dataListeners.push(listener);
    }),
    subscribeAsync: vi.fn(async () => undefined),
    writeAsync: vi.fn(async (_data: Buffer, _withoutResponse: boolean) => undefined),
  };
};

const createFakePeripheral = (address: string) => {
  const notification = createFakeCharacteristic(blindProfile.notificationCharacteristicUuid);
  const command = createFakeCharacteristic(blindProfile.commandCharacteristicUuid);
  const disconnectListeners: Array<() => void> = [];
  const peripheral = {
    id: address.replace(/:/g, '').toLowerCase(),
    address: address.toLowerCase(),
    state: 'disconnected',
    connectAsync: vi.fn(async () => {
      peripheral.state = 'connected';
    }),
    discoverSomeServicesAndCharacteristicsAsync: vi.fn(async () => ({
      services: [],
      characteristics: [notification, command],
    })),
    disconnectAsync: vi.fn(async () => {
      peripheral.state = 'disconnected';
      disconnectListeners.splice(0).forEach((listener) => listener());
    }),
    once: vi.fn((_event: string, listener: () => void) => {
      disconnectListeners.push(listener);
    }),
    dropLink: () => {
      peripheral.state = 'disconnected';
      disconnectListeners.splice(0).forEach((listener) => listener());
    },
  };
  return { peripheral, notification, command };
};

describe('createNobleTransport', () => {
  const TARGET = 'AA:BB:CC:DD:EE:FF';

  beforeEach(() => {
    radio.listeners.clear();
    radio.startScanningAsync.mockReset();
    radio.stopScanningAsync.mockClear();
  });

  const advertise = (...peripherals: unknown[]) => {
    radio.startScanningAsync.mockImplementation(async () => {
      peripherals.forEach((peripheral) => radio.emit('discover', peripheral));
    });
  };

  it('scans for the peripheral by address and discovers its characteristics', async () => {
    const other = createFakePeripheral('11:22:33:44:55:66');
    const target = createFakePeripheral(TARGET);
    advertise(other.peripheral, target.peripheral);
    const transport = createNobleTransport({ scanTimeoutMs: 1000, maxConnectAttempts: 2 });

    const handle = await transport.connect({ address: TARGET });

    expect(handle.peripheral).toBe(target.peripheral);
    expect(other.peripheral.connectAsync).not.toHaveBeenCalled();
    expect(radio.stopScanningAsync).toHaveBeenCalledTimes(1);
    expect(radio.listeners.get('discover')?.size).toBe(0);
    expect(transport.isConnected(handle)).toBe(true);
  });

  it('retries the connection before giving up', async () => {
    const target = createFakePeripheral(TARGET);
    target.peripheral.connectAsync.mockRejectedValueOnce(new Error('Connection timed out'));
    advertise(target.peripheral);
    const transport = createNobleTransport({ scanTimeoutMs: 1000, maxConnectAttempts: 2 });

    await transport.connect({ address: TARGET });
    expect(target.peripheral.connectAsync).toHaveBeenCalledTimes(2);

    target.peripheral.connectAsync.mockRejectedValue(new Error('Connection timed out'));
    target.peripheral.state = 'disconnected';
    await expect(transport.connect({ address: TARGET })).rejects.toBeInstanceOf(
      TransientTransportError,
    );
    expect(target.peripheral.connectAsync).toHaveBeenCalledTimes(4);
  });

  it.each(['Connection Limit Exceeded', 'Memory Capacity Exceeded'])(
    'reports %s as no free connection slot without retrying',
    async (message) => {
      const target = createFakePeripheral(TARGET);
      target.peripheral.connectAsync.mockRejectedValueOnce(new Error(message));
      advertise(target.peripheral);
      const transport = createNobleTransport({ scanTimeoutMs: 1000, maxConnectAttempts: 3 });

      await expect(transport.connect({ address: TARGET })).rejects.toBeInstanceOf(
        ConnectionSlotsExhaustedError,
      );
      expect(target.peripheral.connectAsync).toHaveBeenCalledTimes(1);
    },
  );

  it('reports peripherals that never advertise', async () => {
    advertise();
    const transport = createNobleTransport({ scanTimeoutMs: 20, maxConnectAttempts: 1 });

    await expect(transport.connect({ address: TARGET })).rejects.toBeInstanceOf(
      DeviceNotFoundError,
    );
    expect(radio.stopScanningAsync).toHaveBeenCalledTimes(1);
  });

  it('forwards notifications and writes with acknowledgement', async () => {
    const target = createFakePeripheral(TARGET);
    advertise(target.peripheral);
    const transport = createNobleTransport({ scanTimeoutMs: 1000, maxConnectAttempts: 1 });
    const handle = await transport.connect({ address: TARGET });
    const received: number[][] = [];

    await transport.subscribe(handle, blindProfile.notificationCharacteristicUuid, (bytes) =>
      received.push(Array.from(bytes)),
    );
    target.notification.dataListeners.forEach((listener) => listener(Buffer.from([0x12, 0x44])));
    await transport.write(handle, blindProfile.commandCharacteristicUuid, new Uint8Array([1, 2]), {
      ack: true,
    });

    expect(target.notification.subscribeAsync).toHaveBeenCalledTimes(1);
    expect(received).toEqual([[0x12, 0x44]]);
    expect(target.command.writeAsync).toHaveBeenCalledWith(Buffer.from([1, 2]), false);
  });

  it('wraps write failures as transient', async () => {
    const target = createFakePeripheral(TARGET);
    advertise(target.peripheral);
    const transport = createNobleTransport({ scanTimeoutMs: 1000, maxConnectAttempts: 1 });
    const handle = await transport.connect({ address: TARGET });
    target.command.writeAsync.mockRejectedValueOnce(new Error('ATT error'));

    await expect(
      transport.write(handle, blindProfile.commandCharacteristicUuid, new Uint8Array([1]), {
        ack: true,
      }),
    ).rejects.toBeInstanceOf(TransientTransportError);
  });

  it('reports only disconnects it did not request', async () => {
    const target = createFakePeripheral(TARGET);
    advertise(target.peripheral);
    const transport = createNobleTransport({ scanTimeoutMs: 1000, maxConnectAttempts: 1 });

    const dropped = await transport.connect({ address: TARGET });
    const onDrop = vi.fn();
    transport.onUnsolicitedDisconnect(dropped, onDrop);
    target.peripheral.dropLink();
    expect(onDrop).toHaveBeenCalledTimes(1);

    const closed = await transport.connect({ address: TARGET });
    const onClose = vi.fn();
    transport.onUnsolicitedDisconnect(closed, onClose);
    await transport.disconnect(closed);
    expect(onClose).not.toHaveBeenCalled();
    expect(transport.isConnected(closed)).toBe(false);
  });
});
