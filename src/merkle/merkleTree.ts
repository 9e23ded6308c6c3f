import { Block, DigestFunction, PairReducer } from './pairReducer';

/**
 * Run one full pass over a level and return the next level.
 * The input is consumed once, in order, so a generator works as well as an array.
 */
export function reduceLevel(blocks: Iterable<Block>, digest: DigestFunction): ReadonlyArray<Block> {
  const reducer = new PairReducer(digest);
  reducer.begin();
  for (const block of blocks) {
    reducer.step(block);
  }
  return reducer.finish();
}

/**
 * Hash raw leaf data into level 0
 */
export function hashLeaves(data: Iterable<Uint8Array>, leafHasher: (data: Uint8Array) => Block): Block[] {
  const leaves: Block[] = [];
  for (const item of data) {
    leaves.push(leafHasher(item));
  }
  return leaves;
}

/**
 * Build every level of the tree, from the given level up to the root.
 *
 * Tree structure:
 * - Adjacent pairs are hashed left-to-right
 * - If a level has an odd number of blocks, the last one is hashed with itself
 * - A single-block level is already the root
 *
 * @returns levels[0] = copy of the input, levels[levels.length - 1] = [root];
 *   every level is frozen
 */
export function buildMerkleLevels(level0: ReadonlyArray<Block>, digest: DigestFunction): ReadonlyArray<Block>[] {
  if (level0.length === 0) {
    throw new Error('Cannot build a Merkle tree from an empty level');
  }

  let currentLevel: ReadonlyArray<Block> = Object.freeze([...level0]);
  const levels: ReadonlyArray<Block>[] = [currentLevel];
  while (currentLevel.length > 1) {
    currentLevel = reduceLevel(currentLevel, digest);
    levels.push(currentLevel);
  }
  return levels;
}

/**
 * Compute just the Merkle root, keeping only the current level in memory
 */
export function computeMerkleRoot(level0: ReadonlyArray<Block>, digest: DigestFunction): Block {
  if (level0.length === 0) {
    throw new Error('Cannot build a Merkle tree from an empty level');
  }

  let currentLevel = level0;
  while (currentLevel.length > 1) {
    currentLevel = reduceLevel(currentLevel, digest);
  }
  return currentLevel[0];
}
