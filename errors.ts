export type DecodeErrorCode = 'INVALID_BASE58' | 'CHECKSUM_MISMATCH' | 'INVALID_LENGTH';

export type PathErrorCode = 'INVALID_SEGMENT' | 'INDEX_OUT_OF_RANGE';

export type EncodeErrorCode = 'INVALID_KEY_LENGTH';

export type ConfigErrorCode = 'MISSING_CODEC';

/**
 * The extended key string could not be turned into key material: bad
 * base58, a checksum mismatch, or a payload of the wrong size.
 */
export class DecodeError extends Error {
  readonly kind = 'decode' as const;
  readonly code: DecodeErrorCode;

  constructor(code: DecodeErrorCode, message: string) {
    super(message);
    this.name = 'DecodeError';
    this.code = code;
  }
}

/** A derivation path segment is not a usable child index. */
export class PathError extends Error {
  readonly kind = 'path' as const;
  readonly code: PathErrorCode;
  readonly segment: string;

  constructor(code: PathErrorCode, segment: string, message: string) {
    super(message);
    this.name = 'PathError';
    this.code = code;
    this.segment = segment;
  }
}

/** A key handed to the WIF encoder is not a 32-byte scalar. */
export class EncodeError extends Error {
  readonly kind = 'encode' as const;
  readonly code: EncodeErrorCode;

  constructor(code: EncodeErrorCode, message: string) {
    super(message);
    this.name = 'EncodeError';
    this.code = code;
  }
}

/** A capability the deriver needs was not provided when it was built. */
export class ConfigError extends Error {
  readonly kind = 'config' as const;
  readonly code: ConfigErrorCode;

  constructor(code: ConfigErrorCode, message: string) {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
  }
}

export type DeriveError = DecodeError | PathError | EncodeError | ConfigError;
