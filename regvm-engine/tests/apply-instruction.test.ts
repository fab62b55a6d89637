import { describe, it, expect } from "vitest";
import { REGISTER_COUNT, WORD_MIN, type Instruction } from "@/regasm-ast";
import { applyInstruction } from "../lib/semantics/apply-instruction";
import { MemoryFault } from "../lib/core/faults";
import type { MachineState } from "../lib/core/state";

function machine(memory: bigint[] = [], pc = 0): MachineState {
  return {
    registers: new BigInt64Array(REGISTER_COUNT),
    memory: BigInt64Array.from(memory),
    pc,
  };
}

function run(state: MachineState, instr: Instruction) {
  return applyInstruction(state, instr);
}

describe("applyInstruction", () => {
  it("ADDRESS loads a data address", () => {
    const state = machine([0n, 0n, 0n], 4);
    const effect = run(state, { op: "ADDRESS", dest: 3, symbol: "c", address: 2 });
    expect(state.registers[3]).toBe(2n);
    expect(state.pc).toBe(5);
    expect(effect).toEqual({ kind: "register", register: 3, before: 0n, after: 2n });
  });

  it("LOAD reads mem[reg[base] + imm]", () => {
    const state = machine([10n, 20n, 30n]);
    state.registers[1] = 1n;
    run(state, { op: "LOAD", dest: 2, base: 1, offset: 1n });
    expect(state.registers[2]).toBe(30n);
    expect(state.pc).toBe(1);
  });

  it("STORE writes reg[src] to mem[reg[base] + imm]", () => {
    const state = machine([10n, 20n]);
    state.registers[4] = -9n;
    state.registers[0] = 2n;
    const effect = run(state, { op: "STORE", src: 4, base: 0, offset: -1n });
    expect(Array.from(state.memory)).toEqual([10n, -9n]);
    expect(effect).toEqual({ kind: "memory", address: 1, before: 20n, after: -9n });
  });

  it("ADD / SUB wrap at 64 bits", () => {
    const state = machine();
    state.registers[1] = WORD_MIN;
    state.registers[2] = 1n;
    run(state, { op: "SUB", dest: 3, left: 1, right: 2 });
    expect(state.registers[3]).toBe(9223372036854775807n);
    run(state, { op: "ADD", dest: 4, left: 3, right: 2 });
    expect(state.registers[4]).toBe(WORD_MIN);
    expect(state.pc).toBe(2);
  });

  it("SETIMM sets an immediate", () => {
    const state = machine();
    run(state, { op: "SETIMM", dest: 6, value: 8n });
    expect(state.registers[6]).toBe(8n);
  });

  it("BRANCH jumps unconditionally", () => {
    const state = machine([], 3);
    const effect = run(state, { op: "BRANCH", target: "top", targetPc: 0 });
    expect(state.pc).toBe(0);
    expect(effect).toEqual({ kind: "branch", taken: true, target: 0 });
  });

  it("BRANCH_IF_ZERO is taken only for exactly zero", () => {
    const instr: Instruction = {
      op: "BRANCH_IF_ZERO",
      cond: 5,
      target: "t",
      targetPc: 9,
    };
    for (const [value, expectedPc] of [
      [0n, 9],
      [1n, 3],
      [-1n, 3],
      [WORD_MIN, 3],
    ] as const) {
      const state = machine([], 2);
      state.registers[5] = value;
      run(state, instr);
      expect(state.pc).toBe(expectedPc);
    }
  });

  it("faults on out-of-range LOAD without touching state", () => {
    const state = machine([1n, 2n], 7);
    state.registers[0] = 1n;
    try {
      run(state, { op: "LOAD", dest: 1, base: 0, offset: 1n });
      throw new Error("expected MemoryFault");
    } catch (err) {
      expect(err).toBeInstanceOf(MemoryFault);
      if (err instanceof MemoryFault) {
        expect(err.pc).toBe(7);
        expect(err.address).toBe(2n);
        expect(err.access).toBe("load");
      }
    }
    expect(state.pc).toBe(7);
    expect(state.registers[1]).toBe(0n);
  });

  it("faults on negative STORE addresses", () => {
    const state = machine([1n]);
    state.registers[2] = 42n;
    expect(() => run(state, { op: "STORE", src: 2, base: 0, offset: -1n })).toThrow(
      MemoryFault,
    );
    expect(Array.from(state.memory)).toEqual([1n]);
    expect(state.pc).toBe(0);
  });
});
