// 組み立て済みプログラム構造の型定義

import type { Instruction } from "./instruction";
import type { Identifier, Word } from "./operand";

export type SymbolKind = "label" | "data";

export type SymbolEntry = {
  name: Identifier;
  kind: SymbolKind;
  // label なら命令インデックス、data ならメモリアドレス
  address: number;
  sourceLine: number;
};

export type SymbolTable = ReadonlyMap<Identifier, SymbolEntry>;

export type LocatedInstr = {
  pc: number;
  instr: Instruction;
  // この命令を指すラベル (複数可)
  labels: readonly Identifier[];
  sourceLine: number;
  text: string;
};

export type DataCell = {
  name: Identifier;
  address: number;
  value: Word;
  sourceLine: number;
};

export type Program = {
  instructions: readonly LocatedInstr[];
  symbols: SymbolTable;
  data: readonly DataCell[];
  // 初期メモリイメージ (data の宣言順)
  memory: readonly Word[];
};
