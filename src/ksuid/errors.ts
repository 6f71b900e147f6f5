export enum KsuidErrorCode {
  INVALID_SIZE = 'invalid_size',
  INVALID_STRING_SIZE = 'invalid_string_size',
  INVALID_STRING_VALUE = 'invalid_string_value',
  INVALID_PAYLOAD_SIZE = 'invalid_payload_size',
  INVALID_TIME = 'invalid_time',
  RANDOM_SOURCE = 'random_source',
  UNSUPPORTED_SCAN_TYPE = 'unsupported_scan_type',
  // Raised by the base62 codec; Ksuid.parse reports both as INVALID_STRING_VALUE
  INVALID_CHARACTER = 'invalid_character',
  OUT_OF_RANGE = 'out_of_range'
}

export class KsuidError extends Error {
  readonly code: KsuidErrorCode;

  constructor(code: KsuidErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KsuidError';
    this.code = code;
  }
}

export function isKsuidError(err: unknown, code?: KsuidErrorCode): err is KsuidError {
  return err instanceof KsuidError && (code === undefined || err.code === code);
}
