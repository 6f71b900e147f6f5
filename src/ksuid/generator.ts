import { cryptoSource } from '../utils/random';
import type { RandomSource } from '../utils/random';
import { Mutex } from '../utils/sync';
import { PAYLOAD_BYTES } from './constants';
import { KsuidError, KsuidErrorCode } from './errors';
import { Ksuid, timeToCorrectedTimestamp } from './ksuid';

export interface GeneratorOptions {
  // Entropy for payloads (default: crypto.randomFillSync)
  source?: RandomSource;

  // Time stamped on new identifiers (default: () => new Date())
  clock?: () => Date;
}

export class KsuidGenerator {
  private mutex = new Mutex();
  private scratch = Buffer.alloc(PAYLOAD_BYTES);
  private source: RandomSource;
  private clock: () => Date;

  constructor(options: GeneratorOptions = {}) {
    this.source = options.source ?? cryptoSource;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Replaces the random source; `undefined` or `null` restores the crypto
   * source. Meant for deterministic tests only.
   */
  setSource(source?: RandomSource | null): void {
    this.exclusive(() => {
      this.source = source ?? cryptoSource;
    });
  }

  newRandomWithTime(time: Date): Ksuid {
    const timestamp = timeToCorrectedTimestamp(time);
    return this.exclusive(() => {
      this.fillScratch();
      return Ksuid.fromTimestamp(timestamp, this.scratch);
    });
  }

  newRandom(): Ksuid {
    return this.newRandomWithTime(this.clock());
  }

  /** Like {@link newRandom}, but a broken entropy source is not recoverable. */
  newKsuid(): Ksuid {
    try {
      return this.newRandom();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`couldn't generate KSUID: ${reason}`, { cause: err });
    }
  }

  private exclusive<T>(fn: () => T): T {
    if (this.mutex.locked) {
      throw new KsuidError(KsuidErrorCode.RANDOM_SOURCE, 'random source re-entered while generating a KSUID');
    }
    return this.mutex.runExclusive(fn);
  }

  private fillScratch(): void {
    let filled = 0;
    while (filled < this.scratch.length) {
      let n: number;
      try {
        n = this.source.read(this.scratch.subarray(filled));
      } catch (err) {
        throw new KsuidError(KsuidErrorCode.RANDOM_SOURCE, 'failed to read from random source', { cause: err });
      }
      if (!Number.isInteger(n) || n <= 0) {
        throw new KsuidError(
          KsuidErrorCode.RANDOM_SOURCE,
          `short read from random source: got ${filled} of ${this.scratch.length} bytes`
        );
      }
      filled += n;
    }
  }
}

const defaultGenerator = new KsuidGenerator();

export function setRandomSource(source?: RandomSource | null): void {
  defaultGenerator.setSource(source);
}

export function newRandomWithTime(time: Date): Ksuid {
  return defaultGenerator.newRandomWithTime(time);
}

export function newRandom(): Ksuid {
  return defaultGenerator.newRandom();
}

export function newKsuid(): Ksuid {
  return defaultGenerator.newKsuid();
}

export function newString(): string {
  return newKsuid().toString();
}

export function newBytes(): Buffer {
  return newKsuid().toBuffer();
}

export function ksuid(): string {
  return newString();
}
