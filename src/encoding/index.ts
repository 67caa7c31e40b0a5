/**
 * Base64 and UTF-8 primitives for text-codec
 *
 * Implemented on Node.js built-ins only.
 *
 * @packageDocumentation
 */

export { isBase64, base64Encode, base64Decode } from './base64.js';
export { utf8Encode, utf8Decode } from './utf8.js';
