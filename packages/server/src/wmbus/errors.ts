export type DecodingErrorCode = 'invalid_field' | 'buffer_too_short' | 'invalid_frame';

/**
 * Raised when a frame that a decoder claims is structurally broken: a field
 * outside the buffer, an impossible date, a bad link header. A frame the
 * decoder simply does not handle is not an error (decoders return null).
 */
export class DecodingError extends Error {
  readonly code: DecodingErrorCode;
  readonly offset?: number;

  constructor(code: DecodingErrorCode, message: string, offset?: number) {
    super(offset === undefined ? message : `${message} (offset ${offset})`);
    this.name = 'DecodingError';
    this.code = code;
    this.offset = offset;
  }
}

export function isDecodingError(err: unknown): err is DecodingError {
  return err instanceof DecodingError;
}
