/**
 * Type exports for text-codec
 */

// Configuration types
export type { Base64Options, TextCodecOptions, HostOutput, HostBridgeOptions } from './config.js';

// Decode result types
export type {
  DecodeFailureReason,
  DecodeSuccess,
  DecodeFailure,
  DecodeResult
} from './result.js';

// Error types
export {
  TextCodecError,
  InvalidEncodingError,
  InvalidUtf8Error,
  HostMarshalError
} from './errors.js';

export type { ErrorSource } from './errors.js';
