import type { Program } from "@/regasm-ast";
import { OptionsError } from "./core/faults";

export type ExecuteOptions = {
  /** 暴走ループ対策の上限ステップ数 (Infinity で無制限) */
  maxSteps?: number;
  /** メモリのワード数。省略時は .data の宣言数 */
  memorySize?: number;
  trace?: boolean;
};

export type NormalizedExecuteOptions = Required<ExecuteOptions>;

export const DEFAULT_MAX_STEPS = 10_000;

export function normalizeExecuteOptions(
  options: ExecuteOptions,
  program: Program,
): NormalizedExecuteOptions {
  const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  if (
    maxSteps !== Number.POSITIVE_INFINITY &&
    (!Number.isInteger(maxSteps) || maxSteps <= 0)
  ) {
    throw new OptionsError(
      `maxSteps は正の整数で指定してください (got: ${maxSteps})`,
      { maxSteps },
    );
  }

  const dataSize = program.memory.length;
  const memorySize = options.memorySize ?? dataSize;
  if (!Number.isInteger(memorySize) || memorySize < dataSize) {
    throw new OptionsError(
      `memorySize はデータ領域 (${dataSize}) 以上の整数で指定してください (got: ${memorySize})`,
      { memorySize, dataSize },
    );
  }

  return { maxSteps, memorySize, trace: options.trace ?? false };
}
