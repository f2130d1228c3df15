export { appConfig } from './config/appConfig';
export type { AppConfig, DeviceSettings, LogLevel } from './config/appConfig';
export { blindProfile } from './config/blindProfile';
export { COMMAND_CODES, NOTIFICATION_MARKERS } from './constants/commands';
export type { CommandType } from './constants/commands';
export { createBlindDevice } from './services/ble/blindDevice';
export type { BlindDevice, BlindDeviceOptions } from './services/ble/blindDevice';
export * from './services/ble/errors';
export { createMockTransport } from './services/ble/mockTransport';
export type { MockHandle, MockTransport, MockTransportOptions } from './services/ble/mockTransport';
export { createNobleTransport } from './services/ble/nobleTransport';
export type { NobleHandle, NobleTransportOptions } from './services/ble/nobleTransport';
export { decodeNotification } from './services/ble/notificationDecoder';
export { createDefaultScheduler } from './services/ble/scheduler';
export type {
  BlindDeviceHandlers,
  CancelHandle,
  CryptoPort,
  SchedulingPort,
  SpawnedTask,
  TransportPort,
  WriteOptions,
} from './services/ble/types';
export { createAesCrypt } from './services/crypto/aesCrypt';
export type { BlindDeviceState, BlindDeviceStore } from './state/deviceStore';
export type * from './types/blind';
