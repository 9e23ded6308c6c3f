/**
 * merkle-root command
 *
 * Reads one block per line (hex, or raw leaf data with --leaves; --hex
 * switches leaf mode back off) and prints the Merkle root. With --levels
 * every intermediate level is printed too.
 */

import { MerkleConfig } from '../config';
import { DigestAlgorithm, createDigest, createLeafHasher, isDigestAlgorithm } from '../merkle/digest';
import { fromHex, toHex } from '../merkle/hex';
import { buildMerkleLevels, hashLeaves } from '../merkle/merkleTree';
import type { Block } from '../merkle/pairReducer';

// ── Argument parsing ─────────────────────────────────────────────────

export interface Args {
  input?: string;
  algorithm: DigestAlgorithm;
  hashLeaves: boolean;
  showLevels: boolean;
}

export function parseArgs(argv: string[], config: MerkleConfig): Args {
  const args: Args = {
    algorithm: config.algorithm,
    hashLeaves: config.hashLeaves,
    showLevels: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--algorithm') {
      const value = argv[++i];
      if (value === undefined || !isDigestAlgorithm(value)) {
        throw new Error(`Unsupported algorithm: ${value ?? '(missing)'}`);
      }
      args.algorithm = value;
    } else if (arg === '--leaves') {
      args.hashLeaves = true;
    } else if (arg === '--hex') {
      args.hashLeaves = false;
    } else if (arg === '--levels') {
      args.showLevels = true;
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option: ${arg}`);
    } else if (args.input === undefined) {
      args.input = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  return args;
}

// ── Input ────────────────────────────────────────────────────────────

/**
 * Leaf mode keeps every line byte-for-byte; only the line terminators and a
 * final empty line after the last newline are dropped.
 * Hex mode trims each line and skips blank ones.
 */
export function readLevel0(content: string, args: Args): Block[] {
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }

  if (args.hashLeaves) {
    const encoder = new TextEncoder();
    return hashLeaves(lines.map(line => encoder.encode(line)), createLeafHasher(args.algorithm));
  }

  const level0: Block[] = [];
  lines.forEach((line, i) => {
    const hex = line.trim();
    if (hex.length === 0) return;
    try {
      level0.push(fromHex(hex));
    } catch (err) {
      throw new Error(`Line ${i + 1}: ${err instanceof Error ? err.message : String(err)}`);
    }
  });
  return level0;
}

// ── Run ──────────────────────────────────────────────────────────────

/**
 * Compute the output lines for the given input content
 */
export function run(content: string, args: Args): string[] {
  const level0 = readLevel0(content, args);
  if (level0.length === 0) {
    throw new Error('No input blocks');
  }

  const levels = buildMerkleLevels(level0, createDigest(args.algorithm));
  const root = toHex(levels[levels.length - 1][0]);

  if (!args.showLevels) {
    return [root];
  }

  const lines = levels.map((level, n) => `level ${n}: ${level.map(toHex).join(' ')}`);
  lines.push(`root: ${root}`);
  return lines;
}
