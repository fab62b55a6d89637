import type { Register, Word } from "@/regasm-ast";
import type { MachineState } from "./state";
import { MemoryFault, type MemoryAccess } from "./faults";
import { toWord } from "./word";

export function getReg(state: MachineState, reg: Register): Word {
  assertRegister(state, reg);
  return state.registers[reg];
}

export function setReg(state: MachineState, reg: Register, value: Word) {
  assertRegister(state, reg);
  state.registers[reg] = toWord(value);
}

/**
 * reg[base] + offset を折り返さずに計算し、範囲内ならメモリ添字を返す。
 * 範囲外なら状態を変えずに MemoryFault を投げる。
 */
export function resolveAddress(
  state: MachineState,
  base: Register,
  offset: Word,
  access: MemoryAccess,
): number {
  const address = getReg(state, base) + offset;
  if (address < 0n || address >= BigInt(state.memory.length)) {
    throw new MemoryFault(state.pc, address, access, state.memory.length);
  }
  return Number(address);
}

export function readMem(state: MachineState, address: number): Word {
  return state.memory[address];
}

export function writeMem(state: MachineState, address: number, value: Word) {
  state.memory[address] = toWord(value);
}

function assertRegister(state: MachineState, reg: Register) {
  if (!Number.isInteger(reg) || reg < 0 || reg >= state.registers.length) {
    throw new Error(`invalid register index: ${reg}`);
  }
}
