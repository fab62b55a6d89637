import type { Instruction, Mnemonic } from "@/regasm-ast";
import { ImageEncodeError } from "./errors";

export const INSTRUCTION_BYTES = 8;

// 命令語の上位 40bit
const OPCODES: Record<Mnemonic, string> = {
  ADD: "0000100000000000100000001000000000000000",
  SUB: "0000100000000000010000000010000000000000",
  LOAD: "0100010000000000100000000000001000000000",
  STORE: "0101000001000000100000000000000100000000",
  ADDRESS: "0100100000000000000001000000000000000001",
  SETIMM: "0100100000000000000001000000000001000000",
  BRANCH: "0100000100000000000010000000000000100000",
  BRANCH_IF_ZERO: "0100001000000000000000100000000000001000",
};

export function opcodeOf(op: Mnemonic): bigint {
  return BigInt(`0b${OPCODES[op]}`);
}

/** 8bit に収まる値を 1 バイトに変換する (signed は 2 の補数) */
export function toByte(
  value: bigint | number,
  signedness: "signed" | "unsigned",
  what: string,
): number {
  const n = Number(value);
  const [min, max] = signedness === "signed" ? [-128, 127] : [0, 255];
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new ImageEncodeError(
      "OperandRange",
      `${what} (${value}) が 8bit (${min}..${max}) に収まりません`,
      { value: String(value), what },
    );
  }
  return n < 0 ? n + 256 : n;
}

/**
 * 命令語 = opcode(40bit) | byte2 | byte1 | byte0
 *
 * | 命令 | byte2 | byte1 | byte0 |
 * |---|---|---|---|
 * | ADD / SUB | Xb | Xa | Xd |
 * | LOAD | imm | Xbase | Xd |
 * | STORE | imm | Xsrc | Xbase |
 * | SETIMM | imm | 0 | Xd |
 * | ADDRESS | データアドレス | 0 | Xd |
 * | BRANCH | 分岐先 ROM アドレス | 0 | 0 |
 * | BRANCH_IF_ZERO | 分岐先 ROM アドレス | Xcond | 0 |
 */
export function operandBytes(instr: Instruction): [number, number, number] {
  const reg = (r: number) => toByte(r, "unsigned", "レジスタ番号");
  const imm = (v: bigint) => toByte(v, "signed", "即値");
  const romAddress = (pc: number) =>
    toByte(pc * INSTRUCTION_BYTES, "unsigned", "分岐先アドレス");

  switch (instr.op) {
    case "ADD":
    case "SUB":
      return [reg(instr.right), reg(instr.left), reg(instr.dest)];
    case "LOAD":
      return [imm(instr.offset), reg(instr.base), reg(instr.dest)];
    case "STORE":
      return [imm(instr.offset), reg(instr.src), reg(instr.base)];
    case "SETIMM":
      return [imm(instr.value), 0, reg(instr.dest)];
    case "ADDRESS":
      return [toByte(instr.address, "unsigned", "データアドレス"), 0, reg(instr.dest)];
    case "BRANCH":
      return [romAddress(instr.targetPc), 0, 0];
    case "BRANCH_IF_ZERO":
      return [romAddress(instr.targetPc), reg(instr.cond), 0];
  }
}

// リトルエンディアン (下位バイトが低位アドレス) で 8 バイトに展開する
export function encodeInstruction(instr: Instruction): Uint8Array {
  const [byte2, byte1, byte0] = operandBytes(instr);
  const word =
    (opcodeOf(instr.op) << 24n) |
    (BigInt(byte2) << 16n) |
    (BigInt(byte1) << 8n) |
    BigInt(byte0);

  const bytes = new Uint8Array(INSTRUCTION_BYTES);
  for (let i = 0; i < INSTRUCTION_BYTES; i += 1) {
    bytes[i] = Number((word >> BigInt(8 * i)) & 0xffn);
  }
  return bytes;
}
