import { createCipheriv, createDecipheriv } from 'node:crypto';

import { appConfig } from '@/config/appConfig';
import { ConfigurationError } from '@/services/ble/errors';
import { CryptoPort } from '@/services/ble/types';
import { toHexByte } from '@/utils/hex';

const ALGORITHM = 'aes-128-ecb';
const KEY_LENGTH = 16;

export const formatTimestamp = (date: Date) =>
  [
    date.getFullYear() % 100,
    date.getMonth() + 1,
    date.getDate(),
    date.getHours(),
    date.getMinutes(),
    date.getSeconds(),
  ]
    .map(toHexByte)
    .join('') + date.getMilliseconds().toString(16).padStart(4, '0');

export const createAesCrypt = (
  key: string | null = appConfig.cryptKey,
  clock: () => Date = () => new Date(),
): CryptoPort => {
  if (key === null) {
    throw new ConfigurationError('No cipher key configured; set BLIND_CRYPT_KEY or pass a key');
  }

  const keyBytes = Buffer.from(key, 'utf8');
  if (keyBytes.length !== KEY_LENGTH) {
    throw new ConfigurationError(`Cipher key must be ${KEY_LENGTH} bytes, got ${keyBytes.length}`);
  }

  return {
    encrypt: (hexPlaintext) => {
      const cipher = createCipheriv(ALGORITHM, keyBytes, null);
      return Buffer.concat([cipher.update(Buffer.from(hexPlaintext, 'hex')), cipher.final()]).toString(
        'hex',
      );
    },
    decrypt: (hexCiphertext) => {
      const decipher = createDecipheriv(ALGORITHM, keyBytes, null);
      return Buffer.concat([
        decipher.update(Buffer.from(hexCiphertext, 'hex')),
        decipher.final(),
      ]).toString('hex');
    },
    timestamp: () => formatTimestamp(clock()),
  };
};
