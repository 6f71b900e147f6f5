export * from './ksuid';
export { cryptoSource } from './utils/random';
export type { RandomSource } from './utils/random';
export { Mutex } from './utils/sync';
