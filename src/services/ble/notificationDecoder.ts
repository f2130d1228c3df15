import {
  END_POSITION_FLAGS,
  MAX_TILT_ANGLE,
  NOTIFICATION_MARKERS,
  RUNNING_DIRECTIONS,
  SPEED_LEVELS,
} from '@/constants/commands';
import { EndPositionInfo, NotificationEvent, SpeedLevel } from '@/types/blind';
import { bytesToHex } from '@/utils/hex';
import { createLogger } from '@/utils/logger';

const logger = createLogger('Blind');

const OFFSETS = {
  endPositionFlags: 4,
  runningDirection: 5,
  position: 6,
  angle: 7,
  favoriteHigh: 6,
  favoriteLow: 7,
  speedLevel: 12,
  battery: 17,
} as const;

const MIN_LENGTH = {
  position: OFFSETS.angle + 1,
  running: OFFSETS.runningDirection + 1,
  status: OFFSETS.battery + 1,
} as const;

type FrameType = keyof typeof NOTIFICATION_MARKERS;

const frameTypes: readonly FrameType[] = ['position', 'running', 'status'];

export const angleToPercent = (angle: number) => Math.round((100 * angle) / MAX_TILT_ANGLE);

export const buildEndPositionInfo = (flags: number, favoriteField: number): EndPositionInfo => ({
  up: (flags & END_POSITION_FLAGS.up) !== 0,
  down: (flags & END_POSITION_FLAGS.down) !== 0,
  favorite: (favoriteField & 0xff00) !== 0 || (favoriteField & 0x00ff) !== 0,
});

const coerceSpeedLevel = (code: number): SpeedLevel | null =>
  SPEED_LEVELS.find((level) => level === code) ?? null;

const readEndPositions = (frame: Uint8Array) =>
  buildEndPositionInfo(
    frame[OFFSETS.endPositionFlags],
    (frame[OFFSETS.favoriteHigh] << 8) | frame[OFFSETS.favoriteLow],
  );

const detectFrameType = (frame: Uint8Array): FrameType | null => {
  const hex = bytesToHex(frame);
  return frameTypes.find((type) => hex.startsWith(NOTIFICATION_MARKERS[type])) ?? null;
};

export const decodeNotification = (frame: Uint8Array): NotificationEvent | null => {
  const type = detectFrameType(frame);
  if (!type) {
    return null;
  }

  if (frame.length < MIN_LENGTH[type]) {
    logger.warn(`Ignoring truncated ${type} notification`, bytesToHex(frame));
    return null;
  }

  switch (type) {
    case 'position':
      return {
        type,
        positionPercent: frame[OFFSETS.position],
        tiltPercent: angleToPercent(frame[OFFSETS.angle]),
        endPositions: readEndPositions(frame),
      };
    case 'running':
      return {
        type,
        opening: frame[OFFSETS.runningDirection] === RUNNING_DIRECTIONS.opening,
      };
    case 'status':
      return {
        type,
        positionPercent: frame[OFFSETS.position],
        tiltPercent: angleToPercent(frame[OFFSETS.angle]),
        batteryPercent: frame[OFFSETS.battery],
        speedLevel: coerceSpeedLevel(frame[OFFSETS.speedLevel]),
        endPositions: readEndPositions(frame),
      };
    default:
      return null;
  }
};
