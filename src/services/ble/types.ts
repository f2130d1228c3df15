import { ConnectionState, PeripheralIdentity, PositionEvent, StatusEvent } from '@/types/blind';

export interface WriteOptions {
  ack: boolean;
}

export interface TransportPort<THandle> {
  connect: (peripheral: PeripheralIdentity) => Promise<THandle>;
  subscribe: (
    handle: THandle,
    characteristicUuid: string,
    onNotify: (bytes: Uint8Array) => void,
  ) => Promise<void>;
  write: (
    handle: THandle,
    characteristicUuid: string,
    bytes: Uint8Array,
    options: WriteOptions,
  ) => Promise<void>;
  disconnect: (handle: THandle) => Promise<void>;
  isConnected: (handle: THandle) => boolean;
  onUnsolicitedDisconnect: (handle: THandle, callback: () => void) => void;
}

export interface CryptoPort {
  encrypt: (hexPlaintext: string) => string;
  decrypt: (hexCiphertext: string) => string;
  timestamp: () => string;
}

export interface CancelHandle {
  cancel: () => void;
}

export interface SpawnedTask<T> extends CancelHandle {
  result: Promise<T>;
}

export interface SchedulingPort {
  scheduleAfter: (delayMs: number, task: () => void | Promise<void>) => CancelHandle;
  spawn: <T>(task: (signal: AbortSignal) => Promise<T>) => SpawnedTask<T>;
}

export interface BlindDeviceHandlers {
  onPosition?: (event: PositionEvent) => void;
  onRunning?: (opening: boolean) => void;
  onStatus?: (event: StatusEvent) => void;
  onConnection?: (state: ConnectionState) => void;
}
