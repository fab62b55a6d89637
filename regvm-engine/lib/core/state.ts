import { REGISTER_COUNT, type Program } from "@/regasm-ast";

export type MachineState = {
  registers: BigInt64Array;
  memory: BigInt64Array;
  pc: number;
};

/**
 * 初期化ルール:
 * - レジスタと PC は 0
 * - メモリ先頭に .data の初期イメージを宣言順で配置し、残りは 0
 */
export function initState(
  program: Program,
  memorySize: number = program.memory.length,
): MachineState {
  if (!Number.isInteger(memorySize) || memorySize < program.memory.length) {
    throw new RangeError(
      `memorySize (${memorySize}) がデータ領域 (${program.memory.length}) より小さいです`,
    );
  }
  const memory = new BigInt64Array(memorySize);
  program.memory.forEach((value, address) => {
    memory[address] = value;
  });

  return {
    registers: new BigInt64Array(REGISTER_COUNT),
    memory,
    pc: 0,
  };
}
