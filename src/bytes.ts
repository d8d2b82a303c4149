/**
 * Parse a whitespace-tolerant hex string (`"A9 00 20"`, `"a90020"`) into bytes.
 *
 * Returns `undefined` when the text contains a non-hex character or an odd digit count.
 */
export function parseHexBytes(text: string): Uint8Array | undefined {
  const digits = text.replace(/\s+/g, '');
  if (digits.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(digits)) return undefined;
  const out = new Uint8Array(digits.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(digits.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

export function lowByte(value: number): number {
  return value & 0xff;
}

export function highByte(value: number): number {
  return (value >> 8) & 0xff;
}
