export type Uint16 = number;

export const WORD_MASK = 0xffff;

/** Widens a two's-complement field of `bitCount` bits to 16 bits. */
export function signExtend(x: Uint16, bitCount: number): Uint16 {
  if ((x >> (bitCount - 1)) & 1) {
    x |= 0xffff << bitCount;
  }
  return x & WORD_MASK;
}

export function formatUint16AsHex(num: Uint16) {
  return "0x" + num.toString(16).padStart(4, "0");
}

export function formatUint16AsBin(num: Uint16) {
  return (num.toString(2).padStart(16, "0").match(/[0-1]{4}/g) ?? []).join(
    " "
  );
}
