// KSUID: K-Sortable Unique Identifier
// 4 bytes timestamp (seconds since epoch offset) + 16 bytes random
// Base62 encoded to 27 characters

export const EPOCH_OFFSET = 1400000000; // May 13, 2014 - KSUID epoch
export const TIMESTAMP_BYTES = 4;
export const PAYLOAD_BYTES = 16;
export const BYTE_LENGTH = TIMESTAMP_BYTES + PAYLOAD_BYTES;
export const STRING_ENCODED_LENGTH = 27;

export const MIN_STRING_ENCODED = '000000000000000000000000000';
export const MAX_STRING_ENCODED = 'aWgEPTl1tmebfsQzFP4bxwgy80V';
