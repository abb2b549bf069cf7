import { createHmac } from 'node:crypto';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { CodecError } from '@jwsign/codec';
import {
  JwsEngine,
  sign,
  verify,
  signCompact,
  verifyCompact,
  register,
  createRegistry,
  constantTimeEqual,
  AlgorithmNotAllowedError,
  AlgorithmNotImplementedError,
  InvalidHeaderError,
  MalformedTokenError,
  SignatureError,
  type AlgorithmParams,
  type JwsHeader,
  type KeyInput,
  type SigningAlgorithm,
} from './index.js';
import { ecKeyPair, rsaKeyPair } from './__fixtures__/keys.js';

const b64 = (text: string) => Buffer.from(text).toString('base64url');

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

function flipBit(bytes: Uint8Array, bit: number): Uint8Array {
  const copy = new Uint8Array(bytes);
  copy[bit >> 3] ^= 1 << (bit & 7);
  return copy;
}

/**
 * Iterated HMAC-SHA-256, truncated: F<rounds>U<length>
 */
class RepeatedHmac implements SigningAlgorithm {
  constructor(
    private readonly rounds: number,
    private readonly length: number
  ) {}

  sign(message: Uint8Array, key: KeyInput): Uint8Array {
    if (typeof key !== 'string') {
      throw new TypeError('RepeatedHmac takes string keys');
    }
    let mac: Uint8Array = message;
    for (let i = 0; i < this.rounds; i++) {
      mac = createHmac('sha256', key).update(mac).digest();
    }
    return mac.subarray(0, this.length);
  }

  verify(message: Uint8Array, signature: Uint8Array, key: KeyInput): void {
    if (!constantTimeEqual(this.sign(message, key), signature)) {
      throw new SignatureError('repeated HMAC mismatch');
    }
  }
}

const repeatedHmacFactory = vi.fn(
  (params: AlgorithmParams) => new RepeatedHmac(Number(params.x), Number(params.y))
);

interface AlgorithmCase {
  alg: string;
  signingKey: KeyInput;
  verifyingKey: KeyInput;
  otherVerifyingKey: KeyInput;
}

const rsa = rsaKeyPair();
const rsaOther = rsaKeyPair('other');

const algorithmCases: AlgorithmCase[] = [
  ...['HS256', 'HS384', 'HS512'].map(alg => ({
    alg,
    signingKey: 'secret',
    verifyingKey: 'secret',
    otherVerifyingKey: 'badsecret',
  })),
  ...['RS256', 'RS384', 'RS512'].map(alg => ({
    alg,
    signingKey: rsa.privateKey,
    verifyingKey: rsa.publicKey,
    otherVerifyingKey: rsaOther.publicKey,
  })),
  ...([['ES256', 'P-256'], ['ES384', 'P-384'], ['ES512', 'P-521']] as const).map(([alg, curve]) => ({
    alg,
    signingKey: ecKeyPair(curve).privateKey,
    verifyingKey: ecKeyPair(curve).publicKey,
    otherVerifyingKey: ecKeyPair(curve, 'other').publicKey,
  })),
];

const payload = { claim: 'x', iat: 1700000000, scope: ['read', 'write'] };

afterEach(() => {
  vi.restoreAllMocks();
});

describe('JwsEngine', () => {
  describe.each(algorithmCases)('$alg', ({ alg, signingKey, verifyingKey, otherVerifyingKey }) => {
    const engine = new JwsEngine();
    const header: JwsHeader = { alg };

    it('should verify its own signature', () => {
      const signature = engine.sign(header, payload, signingKey);
      expect(() => engine.verify(header, payload, signature, verifyingKey)).not.toThrow();
    });

    it('should reject a different key', () => {
      const signature = engine.sign(header, payload, signingKey);
      expect(() => engine.verify(header, payload, signature, otherVerifyingKey)).toThrow(SignatureError);
    });

    it('should reject a single flipped bit anywhere in the signature', () => {
      const signature = engine.sign(header, payload, signingKey);
      const bits = signature.length * 8;

      for (const bit of [0, 7, bits >> 1, bits - 1]) {
        expect(() => engine.verify(header, payload, flipBit(signature, bit), verifyingKey)).toThrow(SignatureError);
      }
    });

    it('should reject a changed payload', () => {
      const signature = engine.sign(header, payload, signingKey);
      expect(() => engine.verify(header, { ...payload, claim: 'y' }, signature, verifyingKey)).toThrow(
        SignatureError
      );
    });

    it('should reject a changed header', () => {
      const signature = engine.sign(header, payload, signingKey);
      expect(() => engine.verify({ alg, kid: 'other' }, payload, signature, verifyingKey)).toThrow(
        SignatureError
      );
    });

    it('should round trip the compact form', () => {
      const token = engine.signCompact({ alg, typ: 'JWT' }, payload, signingKey);

      expect(engine.verifyCompact(token, verifyingKey)).toEqual({
        header: { alg, typ: 'JWT' },
        payload,
      });
    });
  });

  describe('HS256 with a shared secret', () => {
    it('should verify with the same secret and reject another', () => {
      const signature = sign({ alg: 'HS256' }, { claim: 'x' }, 'secret');

      expect(() => verify({ alg: 'HS256' }, { claim: 'x' }, signature, 'secret')).not.toThrow();
      expect(() => verify({ alg: 'HS256' }, { claim: 'x' }, signature, 'badsecret')).toThrow(SignatureError);
    });

    it('should reject every single-bit change of the signature', () => {
      const signature = sign({ alg: 'HS256' }, { claim: 'x' }, 'secret');

      for (let bit = 0; bit < signature.length * 8; bit++) {
        expect(() => verify({ alg: 'HS256' }, { claim: 'x' }, flipBit(signature, bit), 'secret')).toThrow(
          SignatureError
        );
      }
    });

    it('should produce the signature over the canonical signing input', () => {
      const expected = createHmac('sha256', 'secret')
        .update('eyJhbGciOiJIUzI1NiJ9.eyJjbGFpbSI6IngifQ')
        .digest();

      expect(Buffer.from(sign({ alg: 'HS256' }, { claim: 'x' }, 'secret')).equals(expected)).toBe(true);
    });

    it('should sign a frozen header without changing it', () => {
      const header = Object.freeze({ alg: 'HS256', typ: 'JWT' });
      const signature = sign(header, { claim: 'x' }, 'secret');

      expect(() => verify({ typ: 'JWT', alg: 'HS256' }, { claim: 'x' }, signature, 'secret')).not.toThrow();
      expect(header).toEqual({ alg: 'HS256', typ: 'JWT' });
    });
  });

  describe('algorithm resolution', () => {
    it('should fail signing with the exact unknown identifier', () => {
      const error = caught(() => sign({ alg: 'XS-999' }, payload, 'secret'));

      expect(error).toBeInstanceOf(AlgorithmNotImplementedError);
      expect(error).toMatchObject({ identifier: 'XS-999' });
    });

    it('should fail verifying with the exact unknown identifier', () => {
      const error = caught(() => verify({ alg: 'XS-999' }, payload, new Uint8Array(32), 'secret'));

      expect(error).toBeInstanceOf(AlgorithmNotImplementedError);
      expect(error).toMatchObject({ identifier: 'XS-999' });
    });

    it('should refuse the none algorithm', () => {
      expect(() => verify({ alg: 'none' }, payload, new Uint8Array(), 'secret')).toThrow(
        AlgorithmNotImplementedError
      );
    });

    it('should refuse a header without alg', () => {
      const header: unknown = { typ: 'JWT' };
      expect(() => new JwsEngine().sign(header as JwsHeader, payload, 'secret')).toThrow(InvalidHeaderError);
    });

    it('should log resolution in debug mode', () => {
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

      new JwsEngine({ debug: true }).sign({ alg: 'HS256' }, payload, 'secret');

      expect(debug).toHaveBeenCalledWith('[jws] resolved HS256 -> HmacAlgorithm');
    });

    it('should stay quiet by default', () => {
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

      new JwsEngine().sign({ alg: 'HS256' }, payload, 'secret');

      expect(debug).not.toHaveBeenCalled();
    });
  });

  describe('allowlist', () => {
    const engine = new JwsEngine({ algorithms: ['RS256'] });

    it('should refuse identifiers outside the allowlist', () => {
      const error = caught(() => engine.sign({ alg: 'HS256' }, payload, 'secret'));

      expect(error).toBeInstanceOf(AlgorithmNotAllowedError);
      expect(error).toMatchObject({ identifier: 'HS256', code: 'ALG_NOT_ALLOWED' });
    });

    it('should allow listed identifiers', () => {
      const signature = engine.sign({ alg: 'RS256' }, payload, rsa.privateKey);
      expect(() => engine.verify({ alg: 'RS256' }, payload, signature, rsa.publicKey)).not.toThrow();
    });
  });

  describe('custom algorithms', () => {
    register(/F(?<x>\d)U(?<y>\d{2})/, repeatedHmacFactory);

    it('should dispatch to the registered factory with the named groups', () => {
      const signature = sign({ alg: 'F7U12' }, payload, 'key');

      expect(repeatedHmacFactory).toHaveBeenCalledWith({ x: '7', y: '12' });
      expect(signature.length).toBe(12);
      expect(() => verify({ alg: 'F7U12' }, payload, signature, 'key')).not.toThrow();
    });

    it('should reject a wrong key', () => {
      const signature = sign({ alg: 'F7U12' }, payload, 'key');
      expect(() => verify({ alg: 'F7U12' }, payload, signature, 'wrong')).toThrow(SignatureError);
    });

    it('should treat parameters as part of the algorithm', () => {
      const signature = sign({ alg: 'F7U12' }, payload, 'key');
      expect(() => verify({ alg: 'F6U12' }, payload, signature, 'key')).toThrow(SignatureError);
    });

    it('should report any error a custom verifier throws as a SignatureError', () => {
      const error = caught(() => verify({ alg: 'F7U12' }, payload, new Uint8Array(12), new Uint8Array(4)));

      expect(error).toBeInstanceOf(SignatureError);
      expect(error).toMatchObject({ reason: 'F7U12 verifier failed: RepeatedHmac takes string keys' });
    });

    it('should treat a false return as a failure', () => {
      const engine = new JwsEngine({
        registry: createRegistry().register('BOOL', () => ({
          sign: () => new Uint8Array([1]),
          verify: () => false,
        })),
      });

      expect(() => engine.verify({ alg: 'BOOL' }, payload, new Uint8Array([1]), 'k')).toThrow(
        'Signature verification failed: BOOL verifier rejected the signature'
      );
    });

    it('should keep custom bindings of one registry out of another', () => {
      const engine = new JwsEngine({ registry: createRegistry() });
      expect(() => engine.sign({ alg: 'F7U12' }, payload, 'key')).toThrow(AlgorithmNotImplementedError);
    });
  });

  describe('compact form', () => {
    it('should assemble header.payload.signature', () => {
      const token = signCompact({ alg: 'HS256' }, { claim: 'x' }, 'secret');
      const [header, body, signature] = token.split('.');

      expect(header).toBe('eyJhbGciOiJIUzI1NiJ9');
      expect(body).toBe('eyJjbGFpbSI6IngifQ');
      expect(signature).toHaveLength(43);
    });

    it('should verify the segments exactly as received', () => {
      const signingInput = `${b64('{"typ":"JWT", "alg":"HS256"}')}.${b64('{ "claim": "x" }')}`;
      const mac = createHmac('sha256', 'secret').update(signingInput).digest('base64url');

      expect(verifyCompact(`${signingInput}.${mac}`, 'secret')).toEqual({
        header: { typ: 'JWT', alg: 'HS256' },
        payload: { claim: 'x' },
      });
    });

    it('should reject a swapped payload', () => {
      const [header, , signature] = signCompact({ alg: 'HS256' }, { claim: 'x' }, 'secret').split('.');
      const forged = `${header}.${b64('{"claim":"y"}')}.${signature}`;

      expect(() => verifyCompact(forged, 'secret')).toThrow(SignatureError);
    });

    it('should reject a re-encoded final signature character', () => {
      const token = signCompact({ alg: 'HS256' }, { claim: 'x' }, 'secret');
      const alphabet = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_';
      // The last of 43 characters carries two unused bits; setting one keeps the decoded bytes
      const last = alphabet.indexOf(token.slice(-1));
      const forged = token.slice(0, -1) + alphabet[last ^ 1];

      expect(() => verifyCompact(forged, 'secret')).toThrow(CodecError);
    });

    it('should refuse an unsigned token', () => {
      const token = `${b64('{"alg":"none"}')}.${b64('{"claim":"x"}')}.AA`;
      expect(() => verifyCompact(token, 'secret')).toThrow('Algorithm not implemented: none');
    });

    it('should refuse an RSA public key replayed as an HMAC secret', () => {
      const publicPem = rsa.publicKey.export({ type: 'spki', format: 'pem' }).toString();
      const signingInput = `${b64('{"alg":"HS256"}')}.${b64('{"admin":true}')}`;
      const mac = createHmac('sha256', publicPem).update(signingInput).digest('base64url');
      const token = `${signingInput}.${mac}`;

      expect(() => verifyCompact(token, publicPem)).toThrow(
        'Signature verification failed: PEM key material cannot be used as an HMAC secret'
      );
      expect(() => new JwsEngine({ algorithms: ['RS256'] }).verifyCompact(token, publicPem)).toThrow(
        AlgorithmNotAllowedError
      );
    });

    it('should reject a token with the wrong number of segments', () => {
      expect(() => verifyCompact('abc', 'secret')).toThrow(MalformedTokenError);
    });

    it('should let codec errors through', () => {
      expect(() => verifyCompact('a*b.e30.AA', 'secret')).toThrow(CodecError);
    });

    it('should refuse a header without alg', () => {
      const token = `${b64('{"typ":"JWT"}')}.${b64('{}')}.AA`;
      expect(() => verifyCompact(token, 'secret')).toThrow('JWS header must have an alg parameter');
    });
  });
});
