/**
 * Configuration types for text-codec
 */

import type { TextCodec } from '../codec.js';

/**
 * Options accepted by the base64 parser
 */
export interface Base64Options {
  /** Strip ASCII whitespace (MIME line breaks) before validating (default: false) */
  ignoreWhitespace?: boolean;
}

/**
 * TextCodec configuration
 */
export type TextCodecOptions = Base64Options;

/**
 * Representation a host runtime hands strings over in
 */
export type HostOutput = 'string' | 'bytes';

/**
 * Host bridge configuration
 */
export interface HostBridgeOptions {
  /** Codec the bridge delegates to (default: a new TextCodec) */
  codec?: TextCodec;
  /** Representation of values returned to the host (default: 'string') */
  output?: HostOutput;
}
