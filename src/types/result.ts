/**
 * Decode outcome types for text-codec
 */

import type { InvalidEncodingError, InvalidUtf8Error } from './errors.js';

/**
 * Why a decode failed
 */
export type DecodeFailureReason = 'invalid-encoding' | 'invalid-utf8';

export interface DecodeSuccess {
  ok: true;
  /** Decoded text (may legitimately be empty) */
  value: string;
}

export type DecodeFailure =
  | { ok: false; reason: 'invalid-encoding'; error: InvalidEncodingError }
  | { ok: false; reason: 'invalid-utf8'; error: InvalidUtf8Error };

/**
 * Tagged result of TextCodec.tryDecode
 */
export type DecodeResult = DecodeSuccess | DecodeFailure;
