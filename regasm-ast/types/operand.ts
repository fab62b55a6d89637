// オペランド関連の基本型

export type Identifier = string;

// レジスタはインデックス (X3 -> 3) で保持する
export type Register = number;

// 64bit 符号付きワード
export type Word = bigint;

export type OperandKind = "register" | "int" | "symbol";

// シンボル未解決のオペランド (パス 1 / パス 2 の間で受け渡す)
export type RawOperand =
  | { kind: "register"; index: Register; text: string }
  | { kind: "int"; value: Word; text: string }
  | { kind: "symbol"; name: Identifier; text: string };
