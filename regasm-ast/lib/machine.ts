import type { Register, Word } from "../types/operand";

// レジスタ数は固定 (X0 .. X31)
export const REGISTER_COUNT = 32;

export const WORD_BITS = 64;
export const WORD_MIN: Word = -(1n << BigInt(WORD_BITS - 1));
export const WORD_MAX: Word = (1n << BigInt(WORD_BITS - 1)) - 1n;

const REGISTER_RE = /^X(\d+)$/;

export function looksLikeRegister(text: string): boolean {
  return REGISTER_RE.test(text);
}

/** `X3` -> 3。範囲外・レジスタ名でない場合は undefined */
export function parseRegister(text: string): Register | undefined {
  const match = text.match(REGISTER_RE);
  if (!match) return undefined;
  const index = Number(match[1]);
  return index < REGISTER_COUNT ? index : undefined;
}

export function registerName(index: Register): string {
  return `X${index}`;
}

export function fitsWord(value: bigint): boolean {
  return value >= WORD_MIN && value <= WORD_MAX;
}
