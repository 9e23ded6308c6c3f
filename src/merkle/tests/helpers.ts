/**
 * Test helpers for Merkle level tests.
 *
 * labelDigest spells each hash out as text, so expected levels read as
 * H(A,B), H(C,C), ...
 */

import { Block, DigestFunction } from '../pairReducer';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const labelDigest: DigestFunction = (first, second) =>
  encoder.encode(`H(${decoder.decode(first)},${decoder.decode(second)})`);

export function block(label: string): Block {
  return encoder.encode(label);
}

export function blocks(...items: string[]): Block[] {
  return items.map(block);
}

export function labels(level: ReadonlyArray<Block>): string[] {
  return level.map(b => decoder.decode(b));
}
