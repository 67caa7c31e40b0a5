/**
 * Strict base64 encoding/decoding using Node.js Buffer
 *
 * Buffer's own base64 decoder skips characters it does not recognise and
 * tolerates missing padding, so input is validated against the standard
 * padded alphabet (RFC 4648 section 4) before it is handed over.
 */

import { InvalidEncodingError } from '../types/errors.js';
import type { Base64Options } from '../types/config.js';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/';
const PAD = '=';
const WHITESPACE = /[\t\n\f\r ]/g;

interface Base64Problem {
  message: string;
  position: number;
}

/**
 * Locates the first reason `encoded` is not canonical padded base64
 */
function findProblem(encoded: string): Base64Problem | null {
  const padStart = encoded.indexOf(PAD);
  const dataEnd = padStart === -1 ? encoded.length : padStart;

  for (let i = 0; i < dataEnd; i++) {
    if (!ALPHABET.includes(encoded[i])) {
      return { message: `Invalid base64 character '${encoded[i]}'`, position: i };
    }
  }

  for (let i = dataEnd; i < encoded.length; i++) {
    if (encoded[i] !== PAD) {
      return { message: `Unexpected '${encoded[i]}' after padding`, position: i };
    }
  }

  const padLength = encoded.length - dataEnd;
  if (padLength > 2) {
    return { message: `Invalid padding of ${padLength} characters`, position: dataEnd };
  }

  if (encoded.length % 4 !== 0) {
    return { message: `Invalid base64 length ${encoded.length}`, position: -1 };
  }

  // Bits of the last data character that fall past the final byte must be zero
  if (padLength > 0) {
    const last = dataEnd - 1;
    const mask = padLength === 2 ? 0x0f : 0x03;
    if ((ALPHABET.indexOf(encoded[last]) & mask) !== 0) {
      return { message: `Non-zero trailing bits in '${encoded[last]}'`, position: last };
    }
  }

  return null;
}

function prepare(encoded: string, options?: Base64Options): string {
  return options?.ignoreWhitespace ? encoded.replace(WHITESPACE, '') : encoded;
}

/**
 * Checks whether a string is canonical standard padded base64.
 * The empty string is valid (it encodes zero bytes).
 */
export function isBase64(encoded: string, options?: Base64Options): boolean {
  return findProblem(prepare(encoded, options)) === null;
}

/**
 * Encodes a string (as UTF-8) or raw bytes to base64
 *
 * @param data - The data to encode
 * @returns Base64 encoded string
 */
export function base64Encode(data: string | Uint8Array): string {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf-8') : Buffer.from(data);
  return buffer.toString('base64');
}

/**
 * Decodes a base64 string to a Buffer
 *
 * Positions reported in errors refer to the input after whitespace
 * removal when `ignoreWhitespace` is set.
 *
 * @throws InvalidEncodingError if the input is not canonical padded base64
 */
export function base64Decode(encoded: string, options?: Base64Options): Buffer {
  const cleaned = prepare(encoded, options);
  const problem = findProblem(cleaned);
  if (problem) {
    throw new InvalidEncodingError(problem.message, cleaned, problem.position);
  }
  return Buffer.from(cleaned, 'base64');
}
