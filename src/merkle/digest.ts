import * as crypto from 'crypto';
import type { Block, DigestFunction } from './pairReducer';

/**
 * Hash algorithms available as digest providers
 */
export const DIGEST_ALGORITHMS = ['sha256', 'sha384', 'sha512', 'sha3-256', 'sha3-512'] as const;

export type DigestAlgorithm = typeof DIGEST_ALGORITHMS[number];

const DIGEST_LENGTHS: Record<DigestAlgorithm, number> = {
  'sha256': 32,
  'sha384': 48,
  'sha512': 64,
  'sha3-256': 32,
  'sha3-512': 64,
};

export function isDigestAlgorithm(value: string): value is DigestAlgorithm {
  return (DIGEST_ALGORITHMS as readonly string[]).includes(value);
}

/**
 * Output length in bytes for the given algorithm
 */
export function digestLength(algorithm: DigestAlgorithm): number {
  return DIGEST_LENGTHS[algorithm];
}

/**
 * Digest over the concatenation of two blocks.
 * Each call gets its own hash object, so one provider can be shared freely.
 * Position matters: digest(a, b) != digest(b, a)
 */
export function createDigest(algorithm: DigestAlgorithm = 'sha256'): DigestFunction {
  return (first: Block, second: Block): Block =>
    new Uint8Array(crypto.createHash(algorithm).update(first).update(second).digest());
}

/**
 * Level-0 hasher: digest of a single leaf's data
 */
export function createLeafHasher(algorithm: DigestAlgorithm = 'sha256'): (data: Uint8Array) => Block {
  return (data: Uint8Array): Block =>
    new Uint8Array(crypto.createHash(algorithm).update(data).digest());
}
