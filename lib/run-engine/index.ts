import { assemble, isAssembleError, type Program } from "@/regasm-ast";
import {
  describeEffect,
  execute,
  OptionsError,
  stateToSnapshot,
  type ExecuteOptions,
  type ExecutionResult,
} from "@/regvm-engine";
import {
  RUN_SCHEMA_VERSION,
  type RunError,
  type RunResult,
  type TraceEntry,
} from "@/lib/run-schema";

// CLI などの呼び出し側が lib/run-engine だけに依存できるよう再エクスポート
export type { ExecuteOptions as RunOptions };

function buildErrorResult(
  type: RunError["type"],
  message: string,
  detail: unknown,
): RunResult {
  return {
    schemaVersion: RUN_SCHEMA_VERSION,
    status: "Failed",
    steps: 0,
    trace: { steps: [] },
    error: { type, message, detail },
  };
}

function toRunResult(program: Program, result: ExecutionResult): RunResult {
  const trace: TraceEntry[] = result.trace.map((s) => ({
    stepId: s.stepId,
    pc: s.pc,
    text: s.text,
    description: describeEffect(s.effect),
  }));
  const base = {
    schemaVersion: RUN_SCHEMA_VERSION,
    steps: result.steps,
    finalState: stateToSnapshot(result.state, program),
    trace: { steps: trace },
  };

  switch (result.status) {
    case "halted":
      return { ...base, status: "Halted" };
    case "faulted": {
      const { fault } = result;
      return {
        ...base,
        status: "Faulted",
        error: {
          type: "MemoryFault",
          message: fault.message,
          detail: {
            pc: fault.pc,
            address: fault.address.toString(),
            access: fault.access,
            memorySize: fault.memorySize,
          },
        },
      };
    }
    case "step-limit":
      return {
        ...base,
        status: "StepLimitExceeded",
        error: {
          type: "StepLimitExceeded",
          message: `最大ステップ数 (${result.steps}) に達したため停止しました`,
          detail: { maxSteps: result.steps, pc: result.state.pc },
        },
      };
  }
}

/**
 * アセンブラ → インタプリタの順で実行し、スキーマに沿った結果を返すファサード。
 * 例外は投げず、失敗は error フィールドで返す。
 */
export function run(source: string, options: ExecuteOptions = {}): RunResult {
  let program: Program;
  try {
    program = assemble(source);
  } catch (err) {
    if (isAssembleError(err)) {
      return buildErrorResult(err.kind, err.message, err.detail);
    }
    return buildErrorResult(
      "InternalError",
      err instanceof Error ? err.message : "アセンブルで例外が発生しました",
      err,
    );
  }

  try {
    return toRunResult(program, execute(program, options));
  } catch (err) {
    if (err instanceof OptionsError) {
      return buildErrorResult("InvalidOptions", err.message, err.detail);
    }
    return buildErrorResult(
      "InternalError",
      err instanceof Error ? err.message : "実行で例外が発生しました",
      err,
    );
  }
}
