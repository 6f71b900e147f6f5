import { BYTE_LENGTH, STRING_ENCODED_LENGTH } from './constants';
import { KsuidError, KsuidErrorCode } from './errors';

export const BASE62_CHARS = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz';

const BASE = 62;
const WORD_BASE = 4294967296; // 2^32
const WORDS = BYTE_LENGTH / 4;
const ZERO_CHAR = BASE62_CHARS.charCodeAt(0);

const DIGIT_VALUES = (() => {
  const table = new Int8Array(128).fill(-1);
  for (let i = 0; i < BASE62_CHARS.length; i++) {
    table[BASE62_CHARS.charCodeAt(i)] = i;
  }
  return table;
})();

// Both conversions are schoolbook long division over a fixed-size digit array:
// encoding divides five 32-bit words by 62, decoding divides 27 base62 digits by
// 2^32. Every intermediate value stays below 63 * 2^32, well inside the range a
// double represents exactly.

export function encodeBase62(src: Uint8Array): string {
  if (src.length !== BYTE_LENGTH) {
    throw new KsuidError(KsuidErrorCode.INVALID_SIZE, `valid KSUIDs are ${BYTE_LENGTH} bytes`);
  }

  const view = new DataView(src.buffer, src.byteOffset, src.byteLength);
  let parts = new Uint32Array(WORDS);
  let quotient = new Uint32Array(WORDS);
  for (let i = 0; i < WORDS; i++) {
    parts[i] = view.getUint32(i * 4, false);
  }

  const dst = Buffer.alloc(STRING_ENCODED_LENGTH, ZERO_CHAR);
  let n = STRING_ENCODED_LENGTH;
  let len = WORDS;

  while (len !== 0) {
    let qlen = 0;
    let remainder = 0;
    for (let i = 0; i < len; i++) {
      const value = parts[i] + remainder * WORD_BASE;
      const digit = Math.floor(value / BASE);
      remainder = value - digit * BASE;
      if (qlen !== 0 || digit !== 0) {
        quotient[qlen++] = digit;
      }
    }

    // Lowest digit comes out first, so fill from the right
    dst[--n] = BASE62_CHARS.charCodeAt(remainder);
    [parts, quotient] = [quotient, parts];
    len = qlen;
  }

  return dst.toString('latin1');
}

export function decodeBase62(src: string): Buffer {
  if (src.length !== STRING_ENCODED_LENGTH) {
    throw new KsuidError(
      KsuidErrorCode.INVALID_STRING_SIZE,
      `valid encoded KSUIDs are ${STRING_ENCODED_LENGTH} characters`
    );
  }

  let parts = new Uint8Array(STRING_ENCODED_LENGTH);
  let quotient = new Uint8Array(STRING_ENCODED_LENGTH);
  for (let i = 0; i < STRING_ENCODED_LENGTH; i++) {
    const code = src.charCodeAt(i);
    const digit = code < DIGIT_VALUES.length ? DIGIT_VALUES[code] : -1;
    if (digit < 0) {
      throw new KsuidError(
        KsuidErrorCode.INVALID_CHARACTER,
        `invalid base62 character ${JSON.stringify(src.charAt(i))} at offset ${i}`
      );
    }
    parts[i] = digit;
  }

  const dst = Buffer.alloc(BYTE_LENGTH);
  let n = BYTE_LENGTH;
  let len = STRING_ENCODED_LENGTH;

  while (len !== 0) {
    let qlen = 0;
    let remainder = 0;
    for (let i = 0; i < len; i++) {
      const value = parts[i] + remainder * BASE;
      const digit = Math.floor(value / WORD_BASE);
      remainder = value - digit * WORD_BASE;
      if (qlen !== 0 || digit !== 0) {
        quotient[qlen++] = digit;
      }
    }

    if (n < 4) {
      throw new KsuidError(KsuidErrorCode.OUT_OF_RANGE, `base62 value ${src} does not fit in ${BYTE_LENGTH} bytes`);
    }
    dst.writeUInt32BE(remainder, n - 4);
    n -= 4;
    [parts, quotient] = [quotient, parts];
    len = qlen;
  }

  return dst;
}
