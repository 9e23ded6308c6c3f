import { DigestFailure, MisuseError, ReducerOperation } from './errors';

/**
 * A block is an opaque byte sequence. Blocks are never copied or mutated here.
 */
export type Block = Uint8Array;

/**
 * Hash of first || second. Must not carry state from one call to the next.
 */
export type DigestFunction = (first: Block, second: Block) => Block;

/**
 * State of one in-flight pass: at most one block waiting for its partner,
 * plus the combined hashes emitted so far.
 */
export interface ReductionState {
  pending: Block | undefined;
  output: Block[];
}

/**
 * Reduces one Merkle tree level to the next by hashing adjacent pairs.
 *
 * One pass is begin(), step() per input block, then finish(). Pairs are
 * formed in arrival order: [A, B, C, D] gives [H(A,B), H(C,D)]. A trailing
 * odd block is paired with itself, so [A, B, C] gives [H(A,B), H(C,C)] and a
 * single block [A] gives [H(A,A)].
 *
 * Not safe to share across concurrent passes. Split a level across two
 * reducers and the pairing is wrong; see {@link PairReducer.combine}.
 */
export class PairReducer {
  private state: ReductionState | undefined;
  private failed = false;

  constructor(private readonly digest: DigestFunction) {}

  /**
   * Levels reduced separately cannot be merged: pairing depends on the
   * position of every block in the whole level. This returns `left`
   * unchanged and must not be relied on for correctness.
   */
  static combine(left: ReadonlyArray<Block>, _right: ReadonlyArray<Block>): ReadonlyArray<Block> {
    return left;
  }

  get isActive(): boolean {
    return this.state !== undefined;
  }

  begin(): void {
    this.assertUsable('begin');
    if (this.state) {
      throw new MisuseError('begin', 'begin() called while a pass is in progress; call finish() first');
    }
    this.state = { pending: undefined, output: [] };
  }

  step(block: Block): void {
    const state = this.activeState('step');

    if (state.pending === undefined) {
      state.pending = block;
      return;
    }

    const hash = this.combinePair(state.pending, block);
    state.output.push(hash);
    state.pending = undefined;
  }

  finish(): ReadonlyArray<Block> {
    const state = this.activeState('finish');

    if (state.pending !== undefined) {
      // Odd count: the last block is paired with itself
      state.output.push(this.combinePair(state.pending, state.pending));
      state.pending = undefined;
    }

    this.state = undefined;
    return Object.freeze(state.output);
  }

  private assertUsable(operation: ReducerOperation): void {
    if (this.failed) {
      throw new MisuseError(operation, `${operation}() called on a reducer whose digest failed; discard it`);
    }
  }

  private activeState(operation: 'step' | 'finish'): ReductionState {
    this.assertUsable(operation);
    if (!this.state) {
      throw new MisuseError(operation, `${operation}() called without begin()`);
    }
    return this.state;
  }

  private combinePair(first: Block, second: Block): Block {
    let hash: unknown;
    try {
      hash = this.digest(first, second);
    } catch (err) {
      this.fail();
      throw new DigestFailure('Digest function failed', { cause: err });
    }

    if (!(hash instanceof Uint8Array)) {
      this.fail();
      throw new DigestFailure('Digest function did not return a Uint8Array');
    }
    return hash;
  }

  private fail(): void {
    this.failed = true;
    this.state = undefined;
  }
}

/**
 * Create a reducer for a single pass (or several sequential passes)
 */
export function createPairReducer(digest: DigestFunction): PairReducer {
  return new PairReducer(digest);
}
