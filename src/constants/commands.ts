import { SpeedLevel } from '@/types/blind';

export const COMMAND_CODES = {
  open: '03020301',
  close: '03020302',
  stop: '03020303',
  favorite: '03020306',
  openTilt: '03020309',
  closeTilt: '0302030a',
  percent: '05020440',
  angle: '05020441',
  speed: '04020364',
  setKey: '02c001',
  statusQuery: '03050f02',
  pointSetQuery: '03050120',
  userQuery: '03050e02',
} as const;

export type CommandType = keyof typeof COMMAND_CODES;

export const NOTIFICATION_MARKERS = {
  position: '1244',
  running: '1041',
  status: '1f44',
} as const;

export const RUNNING_DIRECTIONS = {
  still: 0x00,
  opening: 0x01,
  closing: 0x02,
} as const;

export const END_POSITION_FLAGS = {
  up: 0x08,
  down: 0x04,
} as const;

export const SPEED_LEVELS: readonly SpeedLevel[] = [1, 2, 3];

export const MAX_TILT_ANGLE = 180;
