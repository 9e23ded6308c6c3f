import { DigestAlgorithm, isDigestAlgorithm } from './merkle/digest';

export interface MerkleConfig {
  algorithm: DigestAlgorithm;
  hashLeaves: boolean;
}

/**
 * Read configuration from the environment.
 *
 * MERKLE_ALGORITHM    digest algorithm (default sha256)
 * MERKLE_HASH_LEAVES  'true' to hash input lines as raw leaf data
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MerkleConfig {
  const algorithm = env.MERKLE_ALGORITHM || 'sha256';
  if (!isDigestAlgorithm(algorithm)) {
    throw new Error(`Unsupported MERKLE_ALGORITHM: ${algorithm}`);
  }

  return {
    algorithm,
    hashLeaves: env.MERKLE_HASH_LEAVES === 'true',
  };
}
