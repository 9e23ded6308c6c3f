// Core pair reduction
export {
  PairReducer,
  createPairReducer,
  Block,
  DigestFunction,
  ReductionState,
} from './pairReducer';
export { MisuseError, DigestFailure, ReducerOperation } from './errors';

// Digest providers
export {
  DIGEST_ALGORITHMS,
  DigestAlgorithm,
  isDigestAlgorithm,
  digestLength,
  createDigest,
  createLeafHasher,
} from './digest';

// Level and root orchestration
export {
  reduceLevel,
  hashLeaves,
  buildMerkleLevels,
  computeMerkleRoot,
} from './merkleTree';

export { toHex, fromHex } from './hex';
