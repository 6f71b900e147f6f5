import { randomFillSync } from 'crypto';

export interface RandomSource {
  // Fills a prefix of buf and returns how many bytes were written; 0 means exhausted
  read(buf: Uint8Array): number;
}

export const cryptoSource: RandomSource = {
  read: (buf: Uint8Array): number => randomFillSync(buf).length
};
