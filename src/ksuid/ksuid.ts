import { inspect } from 'util';
import { Binary } from 'bson';
import { decodeBase62, encodeBase62 } from './base62';
import {
  BYTE_LENGTH,
  EPOCH_OFFSET,
  MAX_STRING_ENCODED,
  MIN_STRING_ENCODED,
  PAYLOAD_BYTES,
  STRING_ENCODED_LENGTH,
  TIMESTAMP_BYTES
} from './constants';
import { KsuidError, KsuidErrorCode } from './errors';
import { Uint128 } from './uint128';

export type KsuidDriverValue = string | null;

const MAX_TIMESTAMP = 0xffffffff;

export function timeToCorrectedTimestamp(time: Date): number {
  const ms = time.getTime();
  if (Number.isNaN(ms)) {
    throw new KsuidError(KsuidErrorCode.INVALID_TIME, 'cannot stamp a KSUID with an invalid date');
  }
  return (Math.floor(ms / 1000) - EPOCH_OFFSET) >>> 0;
}

export function correctedTimestampToTime(timestamp: number): Date {
  return new Date((timestamp + EPOCH_OFFSET) * 1000);
}

export class Ksuid {
  static readonly Nil = new Ksuid(Buffer.alloc(BYTE_LENGTH));
  static readonly Max = new Ksuid(Buffer.alloc(BYTE_LENGTH, 0xff));

  private readonly bytes: Buffer;

  // Callers hand over a buffer nobody else holds; every public path copies first
  private constructor(bytes: Buffer) {
    this.bytes = bytes;
  }

  static fromBytes(bytes: Uint8Array): Ksuid {
    if (bytes.length !== BYTE_LENGTH) {
      throw new KsuidError(KsuidErrorCode.INVALID_SIZE, `valid KSUIDs are ${BYTE_LENGTH} bytes`);
    }
    return new Ksuid(Buffer.from(bytes));
  }

  static fromParts(time: Date, payload: Uint8Array): Ksuid {
    return Ksuid.fromTimestamp(timeToCorrectedTimestamp(time), payload);
  }

  static fromTimestamp(timestamp: number, payload: Uint8Array): Ksuid {
    if (payload.length !== PAYLOAD_BYTES) {
      throw new KsuidError(KsuidErrorCode.INVALID_PAYLOAD_SIZE, `valid KSUID payloads are ${PAYLOAD_BYTES} bytes`);
    }
    if (!Number.isInteger(timestamp) || timestamp < 0 || timestamp > MAX_TIMESTAMP) {
      throw new KsuidError(
        KsuidErrorCode.INVALID_TIME,
        `KSUID timestamps are integers from 0 to ${MAX_TIMESTAMP}, got ${timestamp}`
      );
    }
    const bytes = Buffer.alloc(BYTE_LENGTH);
    bytes.writeUInt32BE(timestamp, 0);
    bytes.set(payload, TIMESTAMP_BYTES);
    return new Ksuid(bytes);
  }

  static parse(s: string): Ksuid {
    if (s.length !== STRING_ENCODED_LENGTH) {
      throw new KsuidError(
        KsuidErrorCode.INVALID_STRING_SIZE,
        `valid encoded KSUIDs are ${STRING_ENCODED_LENGTH} characters`
      );
    }

    let bytes: Buffer;
    try {
      bytes = decodeBase62(s);
    } catch (err) {
      throw new KsuidError(
        KsuidErrorCode.INVALID_STRING_VALUE,
        `valid encoded KSUIDs are bounded by ${MIN_STRING_ENCODED} and ${MAX_STRING_ENCODED}`,
        { cause: err }
      );
    }
    return new Ksuid(bytes);
  }

  // The OrNil variants trade the error for the Nil sentinel

  static fromBytesOrNil(bytes: Uint8Array): Ksuid {
    try {
      return Ksuid.fromBytes(bytes);
    } catch {
      return Ksuid.Nil;
    }
  }

  static fromPartsOrNil(time: Date, payload: Uint8Array): Ksuid {
    try {
      return Ksuid.fromParts(time, payload);
    } catch {
      return Ksuid.Nil;
    }
  }

  static parseOrNil(s: string): Ksuid {
    try {
      return Ksuid.parse(s);
    } catch {
      return Ksuid.Nil;
    }
  }

  static unmarshalText(text: string | Uint8Array): Ksuid {
    return Ksuid.parse(typeof text === 'string' ? text : Buffer.from(text).toString('latin1'));
  }

  static unmarshalBinary(bytes: Uint8Array): Ksuid {
    return Ksuid.fromBytes(bytes);
  }

  /**
   * Reads a value back from the database driver. Accepts what {@link toBSON}
   * writes (null or the string form) as well as raw 20-byte binary, and maps an
   * empty value to Nil.
   */
  static fromBSON(value: unknown): Ksuid {
    if (value === null || value === undefined) {
      return Ksuid.Nil;
    }
    if (typeof value === 'string') {
      return Ksuid.scan(Buffer.from(value, 'utf8'));
    }
    if (value instanceof Binary) {
      return Ksuid.scan(value.buffer.subarray(0, value.position));
    }
    if (value instanceof Uint8Array) {
      return Ksuid.scan(value);
    }
    const typeName = typeof value === 'object' ? value.constructor?.name ?? 'object' : typeof value;
    throw new KsuidError(KsuidErrorCode.UNSUPPORTED_SCAN_TYPE, `scan: unable to scan type ${typeName} into KSUID`);
  }

  private static scan(raw: Uint8Array): Ksuid {
    switch (raw.length) {
      case 0:
        return Ksuid.Nil;
      case BYTE_LENGTH:
        return Ksuid.unmarshalBinary(raw);
      case STRING_ENCODED_LENGTH:
        return Ksuid.unmarshalText(raw);
      default:
        throw new KsuidError(KsuidErrorCode.INVALID_SIZE, `valid KSUIDs are ${BYTE_LENGTH} bytes`);
    }
  }

  get timestamp(): number {
    return this.bytes.readUInt32BE(0);
  }

  get time(): Date {
    return correctedTimestampToTime(this.timestamp);
  }

  get payload(): Buffer {
    return Buffer.from(this.bytes.subarray(TIMESTAMP_BYTES));
  }

  toBuffer(): Buffer {
    return Buffer.from(this.bytes);
  }

  toString(): string {
    return encodeBase62(this.bytes);
  }

  toJSON(): string {
    return this.toString();
  }

  toBSON(): KsuidDriverValue {
    return this.isNil() ? null : this.toString();
  }

  marshalText(): Buffer {
    return Buffer.from(this.toString(), 'latin1');
  }

  marshalBinary(): Buffer {
    return this.toBuffer();
  }

  isNil(): boolean {
    return this.equals(Ksuid.Nil);
  }

  equals(other: Ksuid): boolean {
    return this.bytes.equals(other.bytes);
  }

  compare(other: Ksuid): -1 | 0 | 1 {
    const order = Buffer.compare(this.bytes, other.bytes);
    return order < 0 ? -1 : order > 0 ? 1 : 0;
  }

  next(): Ksuid {
    let timestamp = this.timestamp;
    const payload = Uint128.fromBytes(this.bytes, TIMESTAMP_BYTES).add(Uint128.ONE);
    if (payload.equals(Uint128.ZERO)) {
      timestamp = (timestamp + 1) >>> 0;
    }
    return Ksuid.fromTimestamp(timestamp, payload.toBytes());
  }

  prev(): Ksuid {
    let timestamp = this.timestamp;
    const payload = Uint128.fromBytes(this.bytes, TIMESTAMP_BYTES).sub(Uint128.ONE);
    if (payload.equals(Uint128.MAX)) {
      timestamp = (timestamp - 1) >>> 0;
    }
    return Ksuid.fromTimestamp(timestamp, payload.toBytes());
  }

  [inspect.custom](): string {
    return `Ksuid(${this.toString()})`;
  }
}

export function isKsuid(value: unknown): value is Ksuid {
  return value instanceof Ksuid;
}
