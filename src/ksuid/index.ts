export { Ksuid, isKsuid, timeToCorrectedTimestamp, correctedTimestampToTime } from './ksuid';
export type { KsuidDriverValue } from './ksuid';
export { encodeBase62, decodeBase62, BASE62_CHARS } from './base62';
export { Uint128 } from './uint128';
export { KsuidError, KsuidErrorCode, isKsuidError } from './errors';
export {
  KsuidGenerator,
  setRandomSource,
  newRandom,
  newRandomWithTime,
  newKsuid,
  newString,
  newBytes,
  ksuid
} from './generator';
export type { GeneratorOptions } from './generator';
export { compare, sort, isSorted } from './sort';
export * from './constants';
