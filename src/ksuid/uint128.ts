const MASK64 = (BigInt(1) << BigInt(64)) - BigInt(1);

/**
 * Unsigned 128-bit integer made of two 64-bit halves.
 *
 * Only what stepping a KSUID payload by one needs: addition and subtraction
 * that wrap modulo 2^128, equality, and a 16-byte big-endian form.
 */
export class Uint128 {
  static readonly ZERO = new Uint128(BigInt(0), BigInt(0));
  static readonly ONE = new Uint128(BigInt(0), BigInt(1));
  static readonly MAX = new Uint128(MASK64, MASK64);

  readonly hi: bigint;
  readonly lo: bigint;

  private constructor(hi: bigint, lo: bigint) {
    this.hi = hi;
    this.lo = lo;
  }

  static fromHalves(hi: bigint, lo: bigint): Uint128 {
    return new Uint128(hi & MASK64, lo & MASK64);
  }

  static fromBytes(buf: Uint8Array, offset = 0): Uint128 {
    if (buf.length - offset < 16) {
      throw new RangeError(`need 16 bytes at offset ${offset}, have ${buf.length - offset}`);
    }
    const view = new DataView(buf.buffer, buf.byteOffset + offset, 16);
    return new Uint128(view.getBigUint64(0, false), view.getBigUint64(8, false));
  }

  toBytes(): Buffer {
    const buf = Buffer.alloc(16);
    buf.writeBigUInt64BE(this.hi, 0);
    buf.writeBigUInt64BE(this.lo, 8);
    return buf;
  }

  add(other: Uint128): Uint128 {
    const lo = (this.lo + other.lo) & MASK64;
    const carry = lo < this.lo ? BigInt(1) : BigInt(0);
    return new Uint128((this.hi + other.hi + carry) & MASK64, lo);
  }

  sub(other: Uint128): Uint128 {
    const lo = (this.lo - other.lo) & MASK64;
    const borrow = this.lo < other.lo ? BigInt(1) : BigInt(0);
    return new Uint128((this.hi - other.hi - borrow) & MASK64, lo);
  }

  equals(other: Uint128): boolean {
    return this.hi === other.hi && this.lo === other.lo;
  }

  toString(): string {
    return ((this.hi << BigInt(64)) | this.lo).toString();
  }
}
