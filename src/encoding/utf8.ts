/**
 * UTF-8 conversion
 *
 * Buffer#toString('utf-8') substitutes U+FFFD for malformed sequences, so
 * decoding goes through a fatal TextDecoder instead.
 */

import { InvalidUtf8Error } from '../types/errors.js';

// ignoreBOM keeps a leading U+FEFF in the output rather than stripping it
const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Encodes text to UTF-8 bytes. Lone surrogates become U+FFFD.
 */
export function utf8Encode(text: string): Uint8Array {
  return Buffer.from(text, 'utf-8');
}

/**
 * Decodes UTF-8 bytes to text
 *
 * @throws InvalidUtf8Error if the bytes are not well-formed UTF-8
 */
export function utf8Decode(bytes: Uint8Array): string {
  try {
    return decoder.decode(bytes);
  } catch (error) {
    throw new InvalidUtf8Error(
      `Invalid UTF-8 in ${bytes.length} decoded bytes`,
      bytes,
      error instanceof Error ? error : undefined
    );
  }
}
