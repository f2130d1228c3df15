import { blindProfile } from '@/config/blindProfile';
import { hexToBytes } from '@/utils/hex';
import { Logger } from '@/utils/logger';

import { CommandFrame, encodeCommandFrame } from './commandFrames';
import { TransientTransportError } from './errors';
import { CryptoPort, TransportPort } from './types';

export interface CommandDispatcherOptions<THandle> {
  transport: TransportPort<THandle>;
  crypto: CryptoPort;
  getHandle: () => THandle | null;
  maxAttempts: number;
  onExhausted: (handle: THandle) => Promise<void>;
  logger: Logger;
}

export interface CommandDispatcher {
  send: (frame: CommandFrame) => Promise<boolean>;
}

export const createCommandDispatcher = <THandle>({
  transport,
  crypto,
  getHandle,
  maxAttempts,
  onExhausted,
  logger,
}: CommandDispatcherOptions<THandle>): CommandDispatcher => {
  const attemptCeiling = Math.max(1, Math.floor(maxAttempts));

  const send = async (frame: CommandFrame) => {
    if (getHandle() === null) {
      logger.warn(`Dropping ${frame.command} command, no active connection`);
      return false;
    }

    // Fresh timestamp on every send.
    const plaintext = encodeCommandFrame(frame) + crypto.timestamp();
    const payload = hexToBytes(crypto.encrypt(plaintext));
    logger.debug(`Sending ${frame.command}`, plaintext);

    let lastError: TransientTransportError | null = null;
    let lastHandle: THandle | null = null;
    for (let attempt = 1; attempt <= attemptCeiling; attempt += 1) {
      const handle = getHandle();
      if (handle === null) {
        logger.warn(`Connection lost while sending ${frame.command}`);
        return false;
      }

      lastHandle = handle;
      try {
        await transport.write(handle, blindProfile.commandCharacteristicUuid, payload, {
          ack: true,
        });
        return true;
      } catch (error) {
        if (!(error instanceof TransientTransportError)) {
          throw error;
        }
        lastError = error;
        logger.warn(`Failed to send ${frame.command} (attempt ${attempt}/${attemptCeiling})`, error);
      }
    }

    logger.error(`Giving up on ${frame.command} after ${attemptCeiling} attempts, disconnecting`);
    if (lastHandle !== null) {
      await onExhausted(lastHandle);
    }
    throw lastError ?? new TransientTransportError(`Failed to send ${frame.command}`);
  };

  return { send };
};
