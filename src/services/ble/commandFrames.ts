import { COMMAND_CODES, CommandType, MAX_TILT_ANGLE } from '@/constants/commands';
import { SpeedLevel } from '@/types/blind';
import { toHexByte } from '@/utils/hex';

export interface CommandFrame {
  command: CommandType;
  payload: readonly number[];
}

export const encodeCommandFrame = ({ command, payload }: CommandFrame) =>
  COMMAND_CODES[command] + payload.map(toHexByte).join('');

export const simpleFrame = (command: CommandType): CommandFrame => ({ command, payload: [] });

export const percentFrame = (percent: number): CommandFrame => ({
  command: 'percent',
  payload: [percent, 0x00],
});

export const angleFrame = (angle: number): CommandFrame => ({
  command: 'angle',
  payload: [0x00, angle],
});

export const tiltPercentToAngle = (percent: number) => Math.round((MAX_TILT_ANGLE * percent) / 100);

export const speedFrame = (level: SpeedLevel): CommandFrame => ({
  command: 'speed',
  payload: [level],
});
