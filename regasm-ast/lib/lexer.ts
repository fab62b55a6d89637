import type { Identifier, RawOperand } from "../types/operand";
import { AssembleError } from "./errors";
import { fitsWord, looksLikeRegister, parseRegister } from "./machine";

export type SectionName = "text" | "data";

export type SourceLine = {
  sourceLine: number;
  content: string;
};

export type Sections = {
  text: SourceLine[];
  data: SourceLine[];
};

const COMMENT_MARKER = "#";
const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;
const INT_RE = /^[+-]?\d+$/;
const LABEL_PREFIX_RE = /^([A-Za-z_][A-Za-z0-9_]*):(.*)$/;

export function stripLineComment(line: string): string {
  const commentIndex = line.indexOf(COMMENT_MARKER);
  return commentIndex >= 0 ? line.slice(0, commentIndex) : line;
}

// `,` と `:` の前後の空白を取り除き、残りの空白を 1 つにまとめる
export function normalizeLine(line: string): string {
  return line
    .trim()
    .replace(/\s*,\s*/g, ",")
    .replace(/\s*:\s*/g, ":")
    .replace(/\s+/g, " ");
}

export function splitSections(source: string): Sections {
  const text: SourceLine[] = [];
  const data: SourceLine[] = [];
  let current: SectionName | undefined;
  let sawText = false;

  const lines = source.split(/\r?\n/);
  for (let i = 0; i < lines.length; i += 1) {
    const sourceLine = i + 1; // 1-based
    const content = normalizeLine(stripLineComment(lines[i]));
    if (content === "") continue;

    if (content.startsWith(".")) {
      if (content === ".text") {
        current = "text";
        sawText = true;
        continue;
      }
      if (content === ".data") {
        current = "data";
        continue;
      }
      throw new AssembleError(
        "SectionError",
        `未知のディレクティブ '${content}'`,
        { sourceLine },
      );
    }

    if (current === undefined) {
      throw new AssembleError(
        "SectionError",
        "セクション (.text / .data) の外に記述があります",
        { sourceLine },
      );
    }
    (current === "text" ? text : data).push({ sourceLine, content });
  }

  if (!sawText) {
    throw new AssembleError("SectionError", ".text セクションがありません");
  }

  return { text, data };
}

/** 行頭の `name:` を全て取り出し、残り (命令部分) と分ける */
export function splitLabels(
  content: string,
  sourceLine: number,
): { labels: Identifier[]; rest: string } {
  const labels: Identifier[] = [];
  let rest = content;

  let match = rest.match(LABEL_PREFIX_RE);
  while (match) {
    const [, name, tail] = match;
    if (looksLikeRegister(name)) {
      throw new AssembleError(
        "MalformedInstruction",
        `レジスタ名 '${name}' はラベルに使えません`,
        { sourceLine, label: name },
      );
    }
    labels.push(name);
    rest = tail.trim();
    match = rest.match(LABEL_PREFIX_RE);
  }

  return { labels, rest };
}

export function splitOperands(text: string, sourceLine: number): string[] {
  if (text.trim() === "") return [];
  const tokens = text.split(",").map((t) => t.trim());
  if (tokens.some((t) => t === "")) {
    throw new AssembleError("MalformedInstruction", "空のオペランドがあります", {
      sourceLine,
    });
  }
  return tokens;
}

export function classifyOperand(token: string, sourceLine: number): RawOperand {
  if (looksLikeRegister(token)) {
    const index = parseRegister(token);
    if (index === undefined) {
      throw new AssembleError(
        "MalformedInstruction",
        `存在しないレジスタ '${token}'`,
        { sourceLine, operand: token },
      );
    }
    return { kind: "register", index, text: token };
  }

  if (INT_RE.test(token)) {
    const value = BigInt(token);
    if (!fitsWord(value)) {
      throw new AssembleError(
        "MalformedInstruction",
        `即値 '${token}' が 64bit 符号付き整数の範囲外です`,
        { sourceLine, operand: token },
      );
    }
    return { kind: "int", value, text: token };
  }

  if (IDENTIFIER_RE.test(token)) {
    return { kind: "symbol", name: token, text: token };
  }

  throw new AssembleError("MalformedInstruction", `無効なオペランド '${token}'`, {
    sourceLine,
    operand: token,
  });
}
