import { describe, expect, it, vi } from "vitest";
import { REFERENCE_SOURCE } from "@/regasm-ast/tests/fixtures";
import { run } from "../index";

const { executeMock } = vi.hoisted(() => ({ executeMock: vi.fn() }));

vi.mock("@/regvm-engine", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@/regvm-engine")>();
  return { ...actual, execute: executeMock };
});

describe("run-engine run (想定外の例外)", () => {
  it("エンジン内部の例外は InternalError として返す", () => {
    executeMock.mockImplementation(() => {
      throw new Error("boom");
    });

    const result = run(REFERENCE_SOURCE, { trace: true });

    expect(executeMock).toHaveBeenCalledTimes(1);
    expect(result.status).toBe("Failed");
    expect(result.error?.type).toBe("InternalError");
    expect(result.error?.message).toBe("boom");
  });
});
