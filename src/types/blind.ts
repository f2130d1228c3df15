export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'disconnecting';

export type SpeedLevel = 1 | 2 | 3;

export interface EndPositionInfo {
  up: boolean;
  down: boolean;
  favorite: boolean;
}

export interface PeripheralIdentity {
  address: string;
  name?: string | null;
}

export interface PositionEvent {
  positionPercent: number;
  tiltPercent: number;
  endPositions: EndPositionInfo;
}

export interface StatusEvent extends PositionEvent {
  batteryPercent: number;
  speedLevel: SpeedLevel | null;
}

export type NotificationEvent =
  | ({ type: 'position' } & PositionEvent)
  | { type: 'running'; opening: boolean }
  | ({ type: 'status' } & StatusEvent);

export interface MovementOptions {
  ignoreEndPositions?: boolean;
}

export interface ConnectOptions {
  useNotificationDelay?: boolean;
}
