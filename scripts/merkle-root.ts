#!/usr/bin/env ts-node
/**
 * Merkle Root CLI
 *
 * Usage:
 *   npm run merkle-root -- blocks.txt
 *   npm run merkle-root -- blocks.txt --algorithm sha512 --levels
 *   cat leaves.txt | npm run merkle-root -- --leaves
 *   MERKLE_HASH_LEAVES=true npm run merkle-root -- blocks.txt --hex
 *
 * Environment:
 *   MERKLE_ALGORITHM    default digest algorithm (sha256)
 *   MERKLE_HASH_LEAVES  'true' to treat input lines as raw leaf data
 */

import * as fs from 'fs';
import * as path from 'path';
import { loadConfig } from '../src/config';
import { parseArgs, run } from '../src/cli/merkleRoot';

function main() {
  const args = parseArgs(process.argv.slice(2), loadConfig());

  // fd 0 is stdin when no file is given
  const content = args.input
    ? fs.readFileSync(path.resolve(args.input), 'utf-8')
    : fs.readFileSync(0, 'utf-8');

  for (const line of run(content, args)) {
    console.log(line);
  }
}

try {
  main();
} catch (err) {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
}
