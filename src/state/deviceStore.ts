import { createStore, StoreApi } from 'zustand/vanilla';

import {
  ConnectionState,
  EndPositionInfo,
  PositionEvent,
  SpeedLevel,
  StatusEvent,
} from '@/types/blind';

export interface BlindDeviceState {
  connectionState: ConnectionState;
  endPositions: EndPositionInfo | null;
  positionPercent: number | null;
  tiltPercent: number | null;
  batteryPercent: number | null;
  speedLevel: SpeedLevel | null;
  lastUpdated: number | null;
  setConnectionState: (state: ConnectionState) => void;
  applyPosition: (event: PositionEvent) => void;
  applyStatus: (event: StatusEvent) => void;
}

export type BlindDeviceStore = StoreApi<BlindDeviceState>;

export const createBlindDeviceStore = (now: () => number = Date.now): BlindDeviceStore =>
  createStore<BlindDeviceState>()((set) => ({
    connectionState: 'disconnected',
    endPositions: null,
    positionPercent: null,
    tiltPercent: null,
    batteryPercent: null,
    speedLevel: null,
    lastUpdated: null,
    setConnectionState: (connectionState) => set({ connectionState }),
    applyPosition: ({ positionPercent, tiltPercent, endPositions }) =>
      set({ positionPercent, tiltPercent, endPositions, lastUpdated: now() }),
    applyStatus: ({ positionPercent, tiltPercent, batteryPercent, speedLevel, endPositions }) =>
      set({
        positionPercent,
        tiltPercent,
        batteryPercent,
        speedLevel,
        endPositions,
        lastUpdated: now(),
      }),
  }));
