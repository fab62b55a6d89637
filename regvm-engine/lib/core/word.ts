import { WORD_BITS, type Word } from "@/regasm-ast";

// 固定幅 (64bit) の 2 の補数表現に丸める
export function toWord(value: bigint): Word {
  return BigInt.asIntN(WORD_BITS, value);
}

export function wrappingAdd(a: Word, b: Word): Word {
  return toWord(a + b);
}

export function wrappingSub(a: Word, b: Word): Word {
  return toWord(a - b);
}
