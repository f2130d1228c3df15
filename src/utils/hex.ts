export const toHexByte = (value: number) => (value & 0xff).toString(16).padStart(2, '0');

export const bytesToHex = (bytes: Uint8Array) => Array.from(bytes, toHexByte).join('');

export const hexToBytes = (hex: string): Uint8Array => {
  const normalized = hex.trim().toLowerCase();
  if (normalized.length % 2 !== 0 || /[^0-9a-f]/.test(normalized)) {
    throw new RangeError(`Invalid hex string: "${hex}"`);
  }

  const bytes = new Uint8Array(normalized.length / 2);
  for (let i = 0; i < bytes.length; i += 1) {
    bytes[i] = parseInt(normalized.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
};
