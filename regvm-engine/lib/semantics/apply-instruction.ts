import type { Instruction, Register, Word } from "@/regasm-ast";
import type { MachineState } from "../core/state";
import {
  getReg,
  readMem,
  resolveAddress,
  setReg,
  writeMem,
} from "../core/state-ops";
import { wrappingAdd, wrappingSub } from "../core/word";

// 1 命令の実行で何が変わったか (トレース表示用)
export type StepEffect =
  | { kind: "register"; register: Register; before: Word; after: Word }
  | { kind: "memory"; address: number; before: Word; after: Word }
  | { kind: "branch"; taken: boolean; target: number };

function assertNever(instr: never, pc: number): never {
  throw new Error(
    `unsupported instruction '${(instr as Instruction).op}' at pc=${pc}`,
  );
}

/**
 * state.pc の位置にある命令として instr を実行し、state をその場で更新する。
 * MemoryFault の場合は状態を一切変えずに例外を投げる。
 */
export function applyInstruction(
  state: MachineState,
  instr: Instruction,
): StepEffect {
  const pc = state.pc;

  const writeRegister = (dest: Register, value: Word): StepEffect => {
    const before = getReg(state, dest);
    setReg(state, dest, value);
    state.pc = pc + 1;
    return { kind: "register", register: dest, before, after: getReg(state, dest) };
  };

  switch (instr.op) {
    case "ADDRESS":
      return writeRegister(instr.dest, BigInt(instr.address));
    case "LOAD": {
      const address = resolveAddress(state, instr.base, instr.offset, "load");
      return writeRegister(instr.dest, readMem(state, address));
    }
    case "STORE": {
      const address = resolveAddress(state, instr.base, instr.offset, "store");
      const before = readMem(state, address);
      writeMem(state, address, getReg(state, instr.src));
      state.pc = pc + 1;
      return {
        kind: "memory",
        address,
        before,
        after: readMem(state, address),
      };
    }
    case "ADD":
      return writeRegister(
        instr.dest,
        wrappingAdd(getReg(state, instr.left), getReg(state, instr.right)),
      );
    case "SUB":
      return writeRegister(
        instr.dest,
        wrappingSub(getReg(state, instr.left), getReg(state, instr.right)),
      );
    case "SETIMM":
      return writeRegister(instr.dest, instr.value);
    case "BRANCH":
      state.pc = instr.targetPc;
      return { kind: "branch", taken: true, target: instr.targetPc };
    case "BRANCH_IF_ZERO": {
      const taken = getReg(state, instr.cond) === 0n;
      state.pc = taken ? instr.targetPc : pc + 1;
      return { kind: "branch", taken, target: instr.targetPc };
    }
    default:
      return assertNever(instr, pc);
  }
}
