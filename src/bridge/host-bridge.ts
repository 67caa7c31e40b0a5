/**
 * Host bridge for text-codec
 * Translates values crossing a foreign-runtime boundary to and from codec text
 */

import { TextCodec } from '../codec.js';
import { utf8Decode, utf8Encode } from '../encoding/utf8.js';
import { HostMarshalError, InvalidUtf8Error } from '../types/errors.js';
import type { HostBridgeOptions, HostOutput } from '../types/config.js';

/**
 * Values a host runtime passes strings as: native strings, or the UTF-8
 * buffer behind one
 */
export type HostValue = string | Uint8Array;

/**
 * Default configuration values
 */
const DEFAULT_OUTPUT: HostOutput = 'string';

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') {
    return value.constructor?.name ?? 'object';
  }
  return typeof value;
}

/**
 * Boundary adapter exposing TextCodec to a host runtime.
 *
 * The bridge only marshals; encode/decode semantics are the codec's. A
 * value the bridge cannot read as a string throws HostMarshalError, while
 * malformed base64 still decodes to an empty host value.
 *
 * @example
 * ```typescript
 * const bridge = new HostBridge({ output: 'bytes' });
 * host.register('TextCodec', {
 *   encode: (value: unknown) => bridge.encode(value),
 *   decode: (value: unknown) => bridge.decode(value)
 * });
 * ```
 */
export class HostBridge {
  private codec: TextCodec;
  private output: HostOutput;

  constructor(options: HostBridgeOptions = {}) {
    this.codec = options.codec ?? new TextCodec();
    this.output = options.output ?? DEFAULT_OUTPUT;
  }

  /**
   * Encodes a host value and returns the result in the host representation
   *
   * @throws HostMarshalError if the value is not a host string
   */
  encode(value: unknown): HostValue {
    return this.toHost(this.codec.encode(this.fromHost(value)));
  }

  /**
   * Decodes a host value and returns the result in the host representation
   *
   * @throws HostMarshalError if the value is not a host string
   */
  decode(value: unknown): HostValue {
    return this.toHost(this.codec.decode(this.fromHost(value)));
  }

  /**
   * Reads a host value as codec text
   */
  private fromHost(value: unknown): string {
    if (typeof value === 'string') {
      return value;
    }
    if (value instanceof Uint8Array) {
      try {
        return utf8Decode(value);
      } catch (error) {
        if (!(error instanceof InvalidUtf8Error)) throw error;
        throw new HostMarshalError('Host string buffer is not valid UTF-8', describe(value), error);
      }
    }
    throw new HostMarshalError(`Cannot read a host string from ${describe(value)}`, describe(value));
  }

  /**
   * Writes codec text in the configured host representation
   */
  private toHost(text: string): HostValue {
    return this.output === 'bytes' ? utf8Encode(text) : text;
  }
}
