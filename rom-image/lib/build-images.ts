import type { Program } from "@/regasm-ast";
import { ImageEncodeError } from "./errors";
import { ImageBuilder } from "./image-builder";
import { encodeInstruction, toByte } from "./encode-instruction";

export type ProgramImages = {
  /** .data の初期値 (1 セル 1 バイト) */
  ram: string;
  /** 命令列 (1 命令 8 バイト) */
  rom: string;
  ramBytes: number;
  romBytes: number;
};

export function buildImages(program: Program): ProgramImages {
  const ram = new ImageBuilder();
  for (const cell of program.data) {
    withSourceLine(cell.sourceLine, () =>
      ram.writeBytes([toByte(cell.value, "signed", `データ '${cell.name}'`)]),
    );
  }

  const rom = new ImageBuilder();
  for (const item of program.instructions) {
    withSourceLine(item.sourceLine, () =>
      rom.writeBytes(encodeInstruction(item.instr)),
    );
  }

  return {
    ram: ram.toText(),
    rom: rom.toText(),
    ramBytes: ram.used,
    romBytes: rom.used,
  };
}

// エラーに元ソースの行番号を付け足す
function withSourceLine<T>(sourceLine: number, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof ImageEncodeError) {
      throw new ImageEncodeError(err.kind, `${err.message} (line ${sourceLine})`, {
        sourceLine,
        cause: err.detail,
      });
    }
    throw err;
  }
}
