/**
 * Error types for text-codec
 */

/**
 * Error source categories
 */
export type ErrorSource = 'encoding' | 'utf8' | 'marshal';

/**
 * Base codec error class
 */
export class TextCodecError extends Error {
  /** Error code */
  code: string;
  /** Error source category */
  source: ErrorSource;

  constructor(message: string, code: string, source: ErrorSource) {
    super(message);
    this.name = 'TextCodecError';
    this.code = code;
    this.source = source;
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Input is not strict standard padded base64
 */
export class InvalidEncodingError extends TextCodecError {
  override source: 'encoding' = 'encoding';
  /** Text that failed to parse */
  input: string;
  /** Offset of the first offending character, or -1 when the length is at fault */
  position: number;

  constructor(message: string, input: string, position: number) {
    super(message, 'INVALID_ENCODING', 'encoding');
    this.name = 'InvalidEncodingError';
    this.input = input;
    this.position = position;
  }
}

/**
 * Decoded bytes are not well-formed UTF-8
 */
export class InvalidUtf8Error extends TextCodecError {
  override source: 'utf8' = 'utf8';
  /** Bytes that failed to decode */
  bytes: Uint8Array;

  constructor(message: string, bytes: Uint8Array, cause?: Error) {
    super(message, 'INVALID_UTF8', 'utf8');
    this.name = 'InvalidUtf8Error';
    this.bytes = bytes;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * A host value could not be turned into codec text
 */
export class HostMarshalError extends TextCodecError {
  override source: 'marshal' = 'marshal';
  /** typeof (or constructor name) of the rejected value */
  valueType: string;

  constructor(message: string, valueType: string, cause?: Error) {
    super(message, 'MARSHAL_ERROR', 'marshal');
    this.name = 'HostMarshalError';
    this.valueType = valueType;
    if (cause) {
      this.cause = cause;
    }
  }
}
