import { PeripheralIdentity } from '@/types/blind';

import { TransientTransportError } from './errors';
import { TransportPort } from './types';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

type NotifyListener = (bytes: Uint8Array) => void;

export interface MockHandle {
  id: number;
  address: string;
  connected: boolean;
}

export interface MockWrite {
  characteristicUuid: string;
  bytes: Uint8Array;
  ack: boolean;
}

export interface MockTransportOptions {
  connectDelayMs?: number;
  writeDelayMs?: number;
  disconnectDelayMs?: number;
}

export interface MockTransport extends TransportPort<MockHandle> {
  connectCalls: PeripheralIdentity[];
  writes: MockWrite[];
  failNextConnect: (error: Error) => void;
  failNextWrites: (count: number, error?: Error) => void;
  notify: (bytes: Uint8Array) => void;
  dropConnection: () => void;
  activeConnections: () => number;
}

// Simulated peripheral for tests and development without a Bluetooth adapter.
export const createMockTransport = ({
  connectDelayMs = 0,
  writeDelayMs = 0,
  disconnectDelayMs = 0,
}: MockTransportOptions = {}): MockTransport => {
  const connectCalls: PeripheralIdentity[] = [];
  const writes: MockWrite[] = [];
  const listeners = new Map<number, Map<string, NotifyListener>>();
  const disconnectCallbacks = new Map<number, () => void>();
  const handles = new Set<MockHandle>();
  let nextId = 1;
  let pendingConnectError: Error | null = null;
  let pendingWriteFailures = 0;
  let writeFailure: Error = new TransientTransportError('Simulated write failure');

  const release = (handle: MockHandle) => {
    handle.connected = false;
    handles.delete(handle);
    listeners.delete(handle.id);
    disconnectCallbacks.delete(handle.id);
  };

  const latestHandle = () => Array.from(handles).pop() ?? null;

  return {
    connectCalls,
    writes,
    connect: async (peripheral) => {
      connectCalls.push(peripheral);
      await delay(connectDelayMs);

      if (pendingConnectError) {
        const error = pendingConnectError;
        pendingConnectError = null;
        throw error;
      }

      const handle: MockHandle = { id: nextId, address: peripheral.address, connected: true };
      nextId += 1;
      handles.add(handle);
      return handle;
    },
    subscribe: async (handle, characteristicUuid, onNotify) => {
      const byCharacteristic = listeners.get(handle.id) ?? new Map<string, NotifyListener>();
      byCharacteristic.set(characteristicUuid, onNotify);
      listeners.set(handle.id, byCharacteristic);
    },
    write: async (handle, characteristicUuid, bytes, { ack }) => {
      await delay(writeDelayMs);
      if (!handle.connected) {
        throw new TransientTransportError('Simulated peripheral is not connected');
      }

      if (pendingWriteFailures > 0) {
        pendingWriteFailures -= 1;
        throw writeFailure;
      }

      writes.push({ characteristicUuid, bytes, ack });
    },
    disconnect: async (handle) => {
      await delay(disconnectDelayMs);
      release(handle);
    },
    isConnected: (handle) => handle.connected,
    onUnsolicitedDisconnect: (handle, callback) => {
      disconnectCallbacks.set(handle.id, callback);
    },
    failNextConnect: (error) => {
      pendingConnectError = error;
    },
    failNextWrites: (count, error = new TransientTransportError('Simulated write failure')) => {
      pendingWriteFailures = count;
      writeFailure = error;
    },
    notify: (bytes) => {
      const handle = latestHandle();
      if (!handle) {
        return;
      }
      listeners.get(handle.id)?.forEach((listener) => listener(bytes));
    },
    dropConnection: () => {
      const handle = latestHandle();
      if (!handle) {
        return;
      }
      const callback = disconnectCallbacks.get(handle.id);
      release(handle);
      callback?.();
    },
    activeConnections: () => handles.size,
  };
};
