export type FetchErrorCode = 'HTTP_ERROR' | 'MAX_RETRIES_EXCEEDED' | 'CANCELLED' | 'CACHE_MISS';
export type ExtractionErrorCode = 'TABLE_NOT_FOUND' | 'CLUB_TABLE_NOT_FOUND';
export type NormalizationErrorCode =
  | 'MISSING_PLAYER_ID'
  | 'MISSING_PLAYER_NAME'
  | 'INVALID_AGE'
  | 'UNKNOWN_POSITION'
  | 'POSITION_MISMATCH'
  | 'MISSING_POSITION'
  | 'INVALID_CURRENCY';
export type WriteErrorCode = 'VALIDATION_FAILED' | 'WRITE_FAILED';

export class EtlError<TCode extends string = string> extends Error {
  readonly code: TCode;

  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options: { code: TCode; details?: Record<string, unknown>; cause?: unknown }
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'EtlError';
    this.code = options.code;
    this.details = options.details;
  }
}

export class FetchError extends EtlError<FetchErrorCode> {
  readonly url: string;

  readonly status?: number;

  readonly attempts: number;

  /** True when the last failure was transient (network, timeout, 5xx, 429, truncated body). */
  readonly retryable: boolean;

  constructor(
    message: string,
    options: {
      code: FetchErrorCode;
      url: string;
      status?: number;
      attempts: number;
      retryable: boolean;
      details?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, options);
    this.name = 'FetchError';
    this.url = options.url;
    this.status = options.status;
    this.attempts = options.attempts;
    this.retryable = options.retryable;
  }
}

export class ExtractionError extends EtlError<ExtractionErrorCode> {
  constructor(message: string, options: { code: ExtractionErrorCode; details?: Record<string, unknown> }) {
    super(message, options);
    this.name = 'ExtractionError';
  }
}

export class NormalizationError extends EtlError<NormalizationErrorCode> {
  readonly field: string;

  readonly value: string;

  constructor(
    message: string,
    options: { code: NormalizationErrorCode; field: string; value: string; details?: Record<string, unknown> }
  ) {
    super(message, options);
    this.name = 'NormalizationError';
    this.field = options.field;
    this.value = options.value;
  }
}

export class WriteError extends EtlError<WriteErrorCode> {
  readonly file: string;

  constructor(
    message: string,
    options: { code: WriteErrorCode; file: string; details?: Record<string, unknown>; cause?: unknown }
  ) {
    super(message, options);
    this.name = 'WriteError';
    this.file = options.file;
  }
}
