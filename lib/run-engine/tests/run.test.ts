import { describe, expect, it } from "vitest";
import { REFERENCE_SOURCE, referenceSource } from "@/regasm-ast/tests/fixtures";
import { RUN_SCHEMA_VERSION } from "@/lib/run-schema";
import { run } from "../index";

describe("run-engine run", () => {
  it("参照プログラムを実行して最終状態を返す", () => {
    const result = run(REFERENCE_SOURCE);

    expect(result.schemaVersion).toBe(RUN_SCHEMA_VERSION);
    expect(result.status).toBe("Halted");
    expect(result.steps).toBe(9);
    expect(result.error).toBeUndefined();
    expect(result.trace.steps).toEqual([]);
    expect(result.finalState?.pc).toBe(11);
    expect(result.finalState?.memory).toEqual([
      { address: 0, symbol: "donut", value: "10" },
      { address: 1, symbol: "jumbo", value: "5" },
    ]);
    expect(result.finalState?.registers.X4).toBe("0");
    expect(result.finalState?.registers.X5).toBe("10");
    expect(result.finalState?.registers.X6).toBe("8");
  });

  it("trace 指定時は各ステップの説明を返す", () => {
    const result = run(REFERENCE_SOURCE, { trace: true });

    expect(result.trace.steps.map((s) => s.description)).toEqual([
      "X0 := 0",
      "X1 := 1",
      "X2 := 5",
      "X3 := 5",
      "X4 := 0",
      "branch -> 8",
      "X5 := 10",
      "mem[0] := 10",
      "X6 := 8",
    ]);
    expect(result.trace.steps[5]).toEqual({
      stepId: 6,
      pc: 5,
      text: "BRANCH_IF_ZERO X4, _amogus",
      description: "branch -> 8",
    });
  });

  it("差が 0 でなければ差分を書き戻す", () => {
    const result = run(referenceSource(3, 7));
    expect(result.status).toBe("Halted");
    expect(result.finalState?.memory.map((c) => c.value)).toEqual(["4", "7"]);
  });

  it("memorySize で拡張したセルはシンボル無しで 0 になる", () => {
    const result = run(REFERENCE_SOURCE, { memorySize: 3 });
    expect(result.finalState?.memory[2]).toEqual({ address: 2, value: "0" });
  });

  it("アセンブルエラーは Failed と種別で返す", () => {
    const result = run(".text\nBRANCH nowhere\n");

    expect(result.status).toBe("Failed");
    expect(result.steps).toBe(0);
    expect(result.finalState).toBeUndefined();
    expect(result.error?.type).toBe("UndefinedSymbol");
    expect(result.error?.detail).toEqual({ sourceLine: 2, symbol: "nowhere" });
  });

  it("不正なオプションは InvalidOptions", () => {
    expect(run(REFERENCE_SOURCE, { maxSteps: 0 }).error?.type).toBe(
      "InvalidOptions",
    );
    const result = run(REFERENCE_SOURCE, { memorySize: 1 });
    expect(result.status).toBe("Failed");
    expect(result.error?.type).toBe("InvalidOptions");
  });

  it("範囲外アクセスは Faulted とフォルト位置を返す", () => {
    const result = run(".text\nSETIMM X1, 3\nLOAD X2, X1, 0\n.data\na: 1\n");

    expect(result.status).toBe("Faulted");
    expect(result.steps).toBe(1);
    expect(result.finalState?.pc).toBe(1);
    expect(result.finalState?.registers.X2).toBe("0");
    expect(result.error?.message).toBe(
      "メモリ範囲外への load: address=3 (size=1, pc=1)",
    );
    expect(result.error).toMatchObject({
      type: "MemoryFault",
      detail: { pc: 1, address: "3", access: "load", memorySize: 1 },
    });
  });

  it("無限ループは StepLimitExceeded で打ち切る", () => {
    const result = run(".text\nloop:\n  BRANCH loop\n", { maxSteps: 5 });

    expect(result.status).toBe("StepLimitExceeded");
    expect(result.steps).toBe(5);
    expect(result.error).toMatchObject({
      type: "StepLimitExceeded",
      detail: { maxSteps: 5, pc: 0 },
    });
  });
});
