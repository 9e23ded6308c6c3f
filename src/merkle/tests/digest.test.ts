import {
  DIGEST_ALGORITHMS,
  createDigest,
  createLeafHasher,
  digestLength,
  isDigestAlgorithm,
} from '../digest';
import { fromHex, toHex } from '../hex';

const encoder = new TextEncoder();

describe('createDigest', () => {
  it('should hash the concatenation of both blocks', () => {
    const digest = createDigest('sha256');
    const hash = digest(encoder.encode('ab'), encoder.encode('c'));
    expect(toHex(hash)).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('should produce different hash for different order (position matters)', () => {
    const digest = createDigest();
    const a = encoder.encode('left');
    const b = encoder.encode('right');
    expect(toHex(digest(a, b))).not.toBe(toHex(digest(b, a)));
  });

  it('should not carry state between calls', () => {
    const digest = createDigest();
    const a = encoder.encode('x');
    const first = toHex(digest(a, a));
    digest(encoder.encode('something'), encoder.encode('else'));
    expect(toHex(digest(a, a))).toBe(first);
  });

  it('should return plain Uint8Array blocks of the algorithm length', () => {
    for (const algorithm of DIGEST_ALGORITHMS) {
      const hash = createDigest(algorithm)(new Uint8Array([1]), new Uint8Array([2]));
      expect(hash).toBeInstanceOf(Uint8Array);
      expect(Buffer.isBuffer(hash)).toBe(false);
      expect(hash).toHaveLength(digestLength(algorithm));
    }
  });
});

describe('createLeafHasher', () => {
  it('should hash a single leaf', () => {
    const hash = createLeafHasher('sha256')(new Uint8Array(0));
    expect(toHex(hash)).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });
});

describe('isDigestAlgorithm', () => {
  it('should accept supported algorithms', () => {
    expect(isDigestAlgorithm('sha256')).toBe(true);
    expect(isDigestAlgorithm('sha3-512')).toBe(true);
  });

  it('should reject anything else', () => {
    expect(isDigestAlgorithm('md5')).toBe(false);
    expect(isDigestAlgorithm('SHA-256')).toBe(false);
  });
});

describe('hex', () => {
  it('should encode lowercase', () => {
    expect(toHex(new Uint8Array([0, 15, 171, 255]))).toBe('000fabff');
  });

  it('should encode a view into a larger buffer', () => {
    const backing = new Uint8Array([1, 2, 3, 4]);
    expect(toHex(backing.subarray(1, 3))).toBe('0203');
  });

  it('should decode with or without 0x prefix', () => {
    expect(Array.from(fromHex('0x0FaB'))).toEqual([15, 171]);
    expect(Array.from(fromHex('0fab'))).toEqual([15, 171]);
  });

  it('should reject odd length', () => {
    expect(() => fromHex('abc')).toThrow('Invalid hex string: abc');
  });

  it('should reject non-hex characters', () => {
    expect(() => fromHex('zz')).toThrow('Invalid hex string: zz');
  });
});
