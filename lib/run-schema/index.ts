import type { AssembleErrorKind } from "@/regasm-ast";

export const RUN_SCHEMA_VERSION = "1.0.0" as const;

export type RunStatus = "Halted" | "Faulted" | "StepLimitExceeded" | "Failed";

export type RunResult = {
  /** 互換性管理のためのスキーマバージョン */
  schemaVersion: typeof RUN_SCHEMA_VERSION;
  /** 実行結果の分類。アセンブル失敗やオプション不正は Failed */
  status: RunStatus;
  /** 実行を完了した命令数 */
  steps: number;
  /** 停止時点のマシン状態 (Failed では省略) */
  finalState?: StateSnapshot;
  /** trace オプション指定時のみ中身が入る */
  trace: ExecutionTrace;
  error?: RunError;
};

export type RunErrorType =
  | AssembleErrorKind
  | "MemoryFault"
  | "StepLimitExceeded"
  | "InvalidOptions"
  | "InternalError";

export type RunError = {
  type: RunErrorType;
  message: string;
  detail?: unknown;
};

// ---------- State ----------

// ワード値は JSON に載せるため 10 進文字列で表す
export type StateSnapshot = {
  pc: number;
  registers: Record<string, string>;
  memory: MemoryCellSnapshot[];
};

export type MemoryCellSnapshot = {
  address: number;
  symbol?: string;
  value: string;
};

// ---------- Trace ----------

export type ExecutionTrace = {
  steps: TraceEntry[];
};

export type TraceEntry = {
  stepId: number;
  pc: number;
  text: string;
  description: string;
};
