export class BlindError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class CalibrationRequiredError extends BlindError {
  constructor(deviceName: string) {
    super(`${deviceName} has no end positions set; calibrate the blind before moving it`);
  }
}

export class FavoriteNotSetError extends BlindError {
  constructor(deviceName: string) {
    super(`${deviceName} has no favorite position set`);
  }
}

export class DeviceNotFoundError extends BlindError {
  constructor(address: string, options?: { cause?: unknown }) {
    super(`Device ${address} could not be found`, options);
  }
}

export class ConnectionSlotsExhaustedError extends BlindError {
  constructor(address: string, options?: { cause?: unknown }) {
    super(`No connection slot available for ${address}`, options);
  }
}

export class TransientTransportError extends BlindError {}

export class TaskCancelledError extends BlindError {
  constructor() {
    super('Task was cancelled');
  }
}

export class ConfigurationError extends BlindError {}

export const describeError = (error: unknown) =>
  error instanceof Error ? error.message : String(error);
