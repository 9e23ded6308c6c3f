const HEX_RE = /^[0-9a-fA-F]*$/;

/**
 * Lowercase hex encoding of a block
 */
export function toHex(block: Uint8Array): string {
  return Buffer.from(block.buffer, block.byteOffset, block.byteLength).toString('hex');
}

/**
 * Decode a hex string (optional 0x prefix) into a block
 */
export function fromHex(text: string): Uint8Array {
  const hex = text.startsWith('0x') || text.startsWith('0X') ? text.slice(2) : text;
  if (hex.length % 2 !== 0 || !HEX_RE.test(hex)) {
    throw new Error(`Invalid hex string: ${text}`);
  }
  return new Uint8Array(Buffer.from(hex, 'hex'));
}
