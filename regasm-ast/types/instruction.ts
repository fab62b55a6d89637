// 解決済み命令 AST の型定義

import type { Identifier, Register, Word } from "./operand";

export const MNEMONICS = [
  "ADDRESS",
  "LOAD",
  "STORE",
  "ADD",
  "SUB",
  "SETIMM",
  "BRANCH",
  "BRANCH_IF_ZERO",
] as const;

export type Mnemonic = (typeof MNEMONICS)[number];

export type Instruction =
  | { op: "ADDRESS"; dest: Register; symbol: Identifier; address: number }
  | { op: "LOAD"; dest: Register; base: Register; offset: Word }
  | { op: "STORE"; src: Register; base: Register; offset: Word }
  | { op: "ADD"; dest: Register; left: Register; right: Register }
  | { op: "SUB"; dest: Register; left: Register; right: Register }
  | { op: "SETIMM"; dest: Register; value: Word }
  | { op: "BRANCH"; target: Identifier; targetPc: number }
  | {
      op: "BRANCH_IF_ZERO";
      cond: Register;
      target: Identifier;
      targetPc: number;
    };
