import { EndPositionInfo } from '@/types/blind';

import { BlindError, CalibrationRequiredError, FavoriteNotSetError } from './errors';

export type GuardResult = { ok: true } | { ok: false; error: BlindError };

const PASS: GuardResult = { ok: true };

// Unknown end positions (no status received yet) pass: the blind reports them after connecting.
export const checkEndPositions = (
  info: EndPositionInfo | null,
  deviceName: string,
  ignoreEndPositions = false,
): GuardResult => {
  if (info && !info.up && !ignoreEndPositions) {
    return { ok: false, error: new CalibrationRequiredError(deviceName) };
  }
  return PASS;
};

export const checkFavoritePosition = (
  info: EndPositionInfo | null,
  deviceName: string,
): GuardResult => {
  if (info && !info.up && !info.favorite) {
    return { ok: false, error: new FavoriteNotSetError(deviceName) };
  }
  return PASS;
};
