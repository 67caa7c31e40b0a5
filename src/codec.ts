/**
 * TextCodec - Public API for text-codec
 *
 * Converts Unicode text to the standard padded base64 form of its UTF-8
 * bytes and back.
 *
 * @packageDocumentation
 */

import { EventEmitter } from 'events';
import { base64Decode, base64Encode } from './encoding/base64.js';
import { utf8Decode, utf8Encode } from './encoding/utf8.js';
import type { TextCodecOptions } from './types/config.js';
import type { DecodeResult } from './types/result.js';
import { InvalidEncodingError, InvalidUtf8Error, TextCodecError } from './types/errors.js';

/**
 * Default configuration values
 */
const DEFAULT_IGNORE_WHITESPACE = false;

/**
 * TextCodec events interface for type safety
 */
export interface TextCodecEvents {
  /** Emitted for every failed decode, before the failure is returned */
  decodeFailure: (error: TextCodecError) => void;
}

/**
 * Base64 text codec.
 *
 * `decode` never throws: anything that is not canonical base64 of valid
 * UTF-8 comes back as the empty string. Use `tryDecode` to find out why.
 *
 * @example
 * ```typescript
 * const codec = new TextCodec();
 * codec.on('decodeFailure', (err) => logger.warn(err.message));
 *
 * codec.encode('hello');            // 'aGVsbG8='
 * codec.decode('aGVsbG8=');         // 'hello'
 * codec.decode('not base64');       // ''
 * codec.tryDecode('/w==').reason;   // 'invalid-utf8'
 * ```
 */
export class TextCodec extends EventEmitter {
  private options: Required<TextCodecOptions>;

  constructor(options: TextCodecOptions = {}) {
    super();
    this.options = {
      ignoreWhitespace: options.ignoreWhitespace ?? DEFAULT_IGNORE_WHITESPACE
    };
  }

  /**
   * Encodes text as base64 of its UTF-8 bytes. Total over all strings.
   */
  encode(input: string): string {
    return base64Encode(utf8Encode(input));
  }

  /**
   * Decodes base64 text, returning '' when the input is not canonical
   * padded base64 or its bytes are not UTF-8.
   */
  decode(input: string): string {
    const result = this.tryDecode(input);
    return result.ok ? result.value : '';
  }

  /**
   * Decodes base64 text into a tagged result.
   *
   * @param input - Text claimed to be base64
   * @returns The decoded text, or the reason and error for the failure
   */
  tryDecode(input: string): DecodeResult {
    let bytes: Buffer;
    try {
      bytes = base64Decode(input, this.options);
    } catch (error) {
      if (!(error instanceof InvalidEncodingError)) throw error;
      this.emit('decodeFailure', error);
      return { ok: false, reason: 'invalid-encoding', error };
    }

    try {
      return { ok: true, value: utf8Decode(bytes) };
    } catch (error) {
      if (!(error instanceof InvalidUtf8Error)) throw error;
      this.emit('decodeFailure', error);
      return { ok: false, reason: 'invalid-utf8', error };
    }
  }
}

const defaultCodec = new TextCodec();

/**
 * Encodes text with default options
 */
export function encode(input: string): string {
  return defaultCodec.encode(input);
}

/**
 * Decodes base64 text with default options, '' on failure
 */
export function decode(input: string): string {
  return defaultCodec.decode(input);
}

/**
 * Decodes base64 text with default options into a tagged result
 */
export function tryDecode(input: string): DecodeResult {
  return defaultCodec.tryDecode(input);
}
