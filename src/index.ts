/**
 * text-codec - base64 transport encoding for Unicode text
 *
 * @packageDocumentation
 */

// Export all types
export * from './types/index.js';

// Export encoding primitives
export * from './encoding/index.js';

// Export host bridge
export * from './bridge/index.js';

// Public API
export { TextCodec, encode, decode, tryDecode } from './codec.js';
export type { TextCodecEvents } from './codec.js';
