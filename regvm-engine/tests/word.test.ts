import { describe, it, expect } from "vitest";
import { WORD_MAX, WORD_MIN } from "@/regasm-ast";
import { toWord, wrappingAdd, wrappingSub } from "../lib/core/word";

describe("64bit wraparound", () => {
  it("wraps on overflow instead of trapping", () => {
    expect(wrappingAdd(WORD_MAX, 1n)).toBe(WORD_MIN);
    expect(wrappingSub(WORD_MIN, 1n)).toBe(WORD_MAX);
    expect(toWord(1n << 64n)).toBe(0n);
    expect(toWord(-1n)).toBe(-1n);
  });

  it("SUB(ADD(a, b), b) returns a", () => {
    const samples = [WORD_MIN, WORD_MIN + 1n, -12345n, -1n, 0n, 1n, 99n, WORD_MAX - 1n, WORD_MAX];
    for (const a of samples) {
      for (const b of samples) {
        expect(wrappingSub(wrappingAdd(a, b), b)).toBe(a);
      }
    }
  });
});
