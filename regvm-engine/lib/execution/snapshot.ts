import type { MemoryCellSnapshot, StateSnapshot } from "@/lib/run-schema";
import { registerName, type Program } from "@/regasm-ast";
import type { MachineState } from "../core/state";

export function stateToSnapshot(
  state: MachineState,
  program: Program,
): StateSnapshot {
  const registers: Record<string, string> = {};
  state.registers.forEach((value, index) => {
    registers[registerName(index)] = value.toString();
  });

  const symbolAt = new Map(program.data.map((d) => [d.address, d.name] as const));
  const memory: MemoryCellSnapshot[] = Array.from(state.memory, (value, address) => {
    const symbol = symbolAt.get(address);
    return symbol === undefined
      ? { address, value: value.toString() }
      : { address, symbol, value: value.toString() };
  });

  return { pc: state.pc, registers, memory };
}
