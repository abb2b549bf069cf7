import { describe, it, expect, vi } from 'vitest';
import { CodecError, defaultCodec, type Codec } from '@jwsign/codec';
import { buildSigningInput, encodeParts } from './signing-input.js';

const text = (bytes: Uint8Array) => new TextDecoder().decode(bytes);

describe('buildSigningInput', () => {
  it('should join the encoded header and payload with a dot', () => {
    expect(text(buildSigningInput({ alg: 'HS256' }, { claim: 'x' }))).toBe(
      'eyJhbGciOiJIUzI1NiJ9.eyJjbGFpbSI6IngifQ'
    );
  });

  it('should not depend on key order', () => {
    const first = buildSigningInput({ typ: 'JWT', alg: 'HS256' }, { b: 2, a: 1 });
    const second = buildSigningInput({ alg: 'HS256', typ: 'JWT' }, { a: 1, b: 2 });

    expect(text(first)).toBe('eyJhbGciOiJIUzI1NiIsInR5cCI6IkpXVCJ9.eyJhIjoxLCJiIjoyfQ');
    expect(text(second)).toBe(text(first));
  });

  it('should delegate to the codec it is given', () => {
    const codec: Codec = {
      ...defaultCodec,
      canonicalize: vi.fn(() => new Uint8Array([1])),
      encode: vi.fn(() => 'AQ'),
    };

    expect(text(buildSigningInput({ alg: 'HS256' }, {}, codec))).toBe('AQ.AQ');
    expect(codec.canonicalize).toHaveBeenCalledTimes(2);
  });

  it('should let codec errors through unchanged', () => {
    expect(() => buildSigningInput({ alg: 'HS256' }, { n: Number.POSITIVE_INFINITY })).toThrow(CodecError);
  });
});

describe('encodeParts', () => {
  it('should encode an empty payload as an empty object', () => {
    expect(encodeParts({ alg: 'HS256' }, {})).toEqual({ header: 'eyJhbGciOiJIUzI1NiJ9', payload: 'e30' });
  });
});
