// 字句解析後・シンボル解決前の中間表現

import type { Mnemonic } from "./instruction";
import type { Identifier, RawOperand, Register, Word } from "./operand";

// 形の検査を通ったオペランドを種別ごとに出現順で並べたもの
export type OperandArgs = {
  registers: Register[];
  ints: Word[];
  symbols: Identifier[];
};

export type ParsedInstr = {
  mnemonic: Mnemonic;
  operands: RawOperand[];
  args: OperandArgs;
  labels: Identifier[];
  sourceLine: number;
  text: string;
};

export type ParsedLabel = {
  name: Identifier;
  // ラベルが束縛される命令インデックス (次の命令)
  pc: number;
  sourceLine: number;
};

export type ParsedData = {
  name: Identifier;
  value: Word;
  sourceLine: number;
};

export type ParsedSource = {
  instructions: ParsedInstr[];
  labels: ParsedLabel[];
  data: ParsedData[];
};
