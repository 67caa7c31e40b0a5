import { describe, it, expect, vi } from 'vitest';
import { TextCodec, encode, decode, tryDecode } from '../../src/codec.js';
import { InvalidEncodingError, InvalidUtf8Error } from '../../src/types/errors.js';

describe('TextCodec', () => {
  describe('encode', () => {
    it('should encode the reference vector', () => {
      expect(encode('hello_world_from_rust')).toBe('aGVsbG9fd29ybGRfZnJvbV9ydXN0');
    });

    it('should encode the empty string to the empty string', () => {
      expect(encode('')).toBe('');
    });

    it('should pad according to byte length', () => {
      expect(encode('a')).toBe('YQ==');
      expect(encode('ab')).toBe('YWI=');
      expect(encode('abc')).toBe('YWJj');
    });

    it('should encode the UTF-8 bytes of non-ASCII text', () => {
      expect(encode('é')).toBe('w6k=');
      expect(encode('😀')).toBe('8J+YgA==');
    });

    it('should keep a leading byte order mark', () => {
      expect(encode('\uFEFFhi')).toBe('77u/aGk=');
    });

    it('should replace a lone surrogate with U+FFFD', () => {
      expect(encode('\uD800')).toBe('77+9');
    });
  });

  describe('decode', () => {
    it('should decode the reference vector', () => {
      expect(decode('aGVsbG9fd29ybGRfZnJvbV9ydXN0')).toBe('hello_world_from_rust');
    });

    it('should decode the empty string to the empty string', () => {
      expect(decode('')).toBe('');
    });

    it('should decode padded input', () => {
      expect(decode('YQ==')).toBe('a');
      expect(decode('YWI=')).toBe('ab');
      expect(decode('w6k=')).toBe('é');
      expect(decode('8J+YgA==')).toBe('😀');
    });

    it('should preserve a leading byte order mark', () => {
      expect(decode('77u/aGk=')).toBe('\uFEFFhi');
    });

    it('should return empty for input of the wrong length', () => {
      expect(decode('dfoiuerw892')).toBe('');
      expect(decode('aGVsbG8')).toBe('');
    });

    it('should return empty for characters outside the standard alphabet', () => {
      expect(decode('aGVs-bG8')).toBe('');
      expect(decode('aGVs bG8=')).toBe('');
    });

    it('should return empty for malformed padding', () => {
      expect(decode('YQ=a')).toBe('');
      expect(decode('Y===')).toBe('');
      expect(decode('====')).toBe('');
    });

    it('should return empty for non-canonical trailing bits', () => {
      expect(decode('YR==')).toBe('');
      expect(decode('aGVsbG9=')).toBe('');
    });

    it('should return empty when the bytes are not UTF-8', () => {
      expect(decode('/w==')).toBe('');
      expect(decode('ww==')).toBe('');
      expect(decode('7aCA')).toBe('');
    });
  });

  describe('tryDecode', () => {
    it('should succeed with an empty value for empty input', () => {
      expect(tryDecode('')).toEqual({ ok: true, value: '' });
    });

    it('should succeed with the decoded value', () => {
      expect(tryDecode('aGVsbG8=')).toEqual({ ok: true, value: 'hello' });
    });

    it('should report a length problem as invalid-encoding', () => {
      const result = tryDecode('dfoiuerw892');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.reason).toBe('invalid-encoding');
      expect(result.error).toBeInstanceOf(InvalidEncodingError);
      expect(result.error.message).toBe('Invalid base64 length 11');
      if (result.reason !== 'invalid-encoding') return;
      expect(result.error.position).toBe(-1);
      expect(result.error.input).toBe('dfoiuerw892');
    });

    it('should report the offending character position', () => {
      const result = tryDecode('aGVs-bG8');

      if (result.ok || result.reason !== 'invalid-encoding') {
        throw new Error('expected invalid-encoding');
      }
      expect(result.error.position).toBe(4);
      expect(result.error.message).toBe("Invalid base64 character '-'");
    });

    it('should report a single 0xFF byte as invalid-utf8', () => {
      const result = tryDecode('/w==');

      if (result.ok || result.reason !== 'invalid-utf8') {
        throw new Error('expected invalid-utf8');
      }
      expect(result.error).toBeInstanceOf(InvalidUtf8Error);
      expect(Array.from(result.error.bytes)).toEqual([0xff]);
      expect(result.error.code).toBe('INVALID_UTF8');
    });

    it('should report a truncated multi-byte sequence as invalid-utf8', () => {
      const result = tryDecode('ww==');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.reason).toBe('invalid-utf8');
    });
  });

  describe('options', () => {
    it('should reject whitespace by default', () => {
      const codec = new TextCodec();
      expect(codec.decode('aGVs\r\nbG8=')).toBe('');
    });

    it('should strip whitespace when ignoreWhitespace is set', () => {
      const codec = new TextCodec({ ignoreWhitespace: true });
      expect(codec.decode('aGVs\r\nbG8=')).toBe('hello');
      expect(codec.decode(' aGVs\tbG8= ')).toBe('hello');
    });

    it('should still reject malformed input when ignoreWhitespace is set', () => {
      const codec = new TextCodec({ ignoreWhitespace: true });
      expect(codec.decode('aGVs\r\nbG8')).toBe('');
    });
  });

  describe('decodeFailure event', () => {
    it('should emit the encoding error for malformed input', () => {
      const codec = new TextCodec();
      const listener = vi.fn();
      codec.on('decodeFailure', listener);

      expect(codec.decode('dfoiuerw892')).toBe('');

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0][0]).toBeInstanceOf(InvalidEncodingError);
    });

    it('should emit the UTF-8 error for non-UTF-8 payloads', () => {
      const codec = new TextCodec();
      const listener = vi.fn();
      codec.on('decodeFailure', listener);

      codec.decode('/w==');

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0][0]).toBeInstanceOf(InvalidUtf8Error);
    });

    it('should not emit for successful decodes', () => {
      const codec = new TextCodec();
      const listener = vi.fn();
      codec.on('decodeFailure', listener);

      codec.decode('');
      codec.decode('aGVsbG8=');

      expect(listener).not.toHaveBeenCalled();
    });
  });
});
