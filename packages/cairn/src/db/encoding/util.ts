export const NEWLINE = 0x0a;
export const SPACE = 0x20;
export const NUL = 0x00;

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

export function encode(text: string): Uint8Array {
  return encoder.encode(text);
}

export function decode(binary: Uint8Array, start = 0, end = binary.length): string {
  return decoder.decode(binary.subarray(start, end));
}

export function concat(...arrays: Uint8Array[]): Uint8Array {
  const size = arrays.reduce((sum, array) => sum + array.length, 0);
  const result = new Uint8Array(size);
  let offset = 0;
  for (const array of arrays) {
    result.set(array, offset);
    offset += array.length;
  }

  return result;
}

const ADLER_MODULUS = 65521;

export function adler32(data: Uint8Array): number {
  let a = 1;
  let b = 0;
  for (let i = 0; i < data.length; i++) {
    a = (a + data[i]) % ADLER_MODULUS;
    b = (b + a) % ADLER_MODULUS;
  }

  return ((b << 16) | a) >>> 0;
}

export function packHash(hex: string): Uint8Array {
  const raw = new Uint8Array(hex.length / 2);
  for (let i = 0; i < raw.length; i++) {
    raw[i] = parseInt(hex.substring(i * 2, i * 2 + 2), 16);
  }

  return raw;
}

export function unpackHash(binary: Uint8Array, start: number, end: number): string {
  let hex = '';
  for (let i = start; i < end; i++) {
    hex += binary[i].toString(16).padStart(2, '0');
  }

  return hex;
}

/**
 * Parses a canonical non-negative decimal: no sign, no leading zeros (other than `0` itself).
 */
export function fromDec(binary: Uint8Array, start: number, end: number): number {
  if (end <= start || (binary[start] === 0x30 && end - start > 1)) {
    throw new SyntaxError('Invalid decimal number');
  }

  let value = 0;
  for (let i = start; i < end; i++) {
    const digit = binary[i] - 0x30;
    if (digit < 0 || digit > 9) {
      throw new SyntaxError('Invalid decimal number');
    }
    value = value * 10 + digit;
  }

  return value;
}

/**
 * Parses an octal number without leading zeros, as tree entry modes are written.
 */
export function fromOct(binary: Uint8Array, start: number, end: number): number {
  if (end <= start || binary[start] === 0x30) {
    throw new SyntaxError('Invalid octal number');
  }

  let value = 0;
  for (let i = start; i < end; i++) {
    const digit = binary[i] - 0x30;
    if (digit < 0 || digit > 7) {
      throw new SyntaxError('Invalid octal number');
    }
    value = value * 8 + digit;
  }

  return value;
}

/**
 * Strips characters that would break the line-oriented commit header format.
 */
export function sanitizeString(value: string): string {
  return value.replace(/[\0\n<>]+/g, '').trim();
}
