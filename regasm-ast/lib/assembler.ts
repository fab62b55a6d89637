import type { Instruction, Mnemonic } from "../types/instruction";
import { MNEMONICS } from "../types/instruction";
import type { Identifier, OperandKind } from "../types/operand";
import type {
  OperandArgs,
  ParsedData,
  ParsedInstr,
  ParsedLabel,
  ParsedSource,
} from "../types/parsed";
import type {
  DataCell,
  LocatedInstr,
  Program,
  SymbolEntry,
  SymbolKind,
  SymbolTable,
} from "../types/program";
import { AssembleError } from "./errors";
import {
  classifyOperand,
  splitLabels,
  splitOperands,
  splitSections,
  type SourceLine,
} from "./lexer";
import { fitsWord, looksLikeRegister } from "./machine";
import { formatInstruction } from "./format";

const OPERAND_SHAPES = {
  ADDRESS: ["register", "symbol"],
  LOAD: ["register", "register", "int"],
  STORE: ["register", "register", "int"],
  ADD: ["register", "register", "register"],
  SUB: ["register", "register", "register"],
  SETIMM: ["register", "int"],
  BRANCH: ["symbol"],
  BRANCH_IF_ZERO: ["register", "symbol"],
} as const satisfies Record<Mnemonic, readonly OperandKind[]>;

const MNEMONIC_SET: ReadonlySet<string> = new Set(MNEMONICS);

const DATA_LINE_RE = /^([A-Za-z_][A-Za-z0-9_]*):(.*)$/;

export function isMnemonic(text: string): text is Mnemonic {
  return MNEMONIC_SET.has(text);
}

/**
 * ソースを字句解析し、シンボル未解決の中間表現を返す。
 * 命令のオペランド数・種別はここで検査する。
 */
export function parseSource(source: string): ParsedSource {
  const sections = splitSections(source);
  const instructions: ParsedInstr[] = [];
  const labels: ParsedLabel[] = [];

  // ラベルのみの行は次の命令に紐づける
  let pending: Identifier[] = [];
  for (const line of sections.text) {
    const { labels: names, rest } = splitLabels(line.content, line.sourceLine);
    for (const name of names) {
      labels.push({ name, pc: instructions.length, sourceLine: line.sourceLine });
    }
    pending = [...pending, ...names];
    if (rest === "") continue;

    instructions.push(parseInstruction(rest, pending, line.sourceLine));
    pending = [];
  }

  const data = sections.data.map(parseDataLine);

  return { instructions, labels, data };
}

function parseInstruction(
  text: string,
  labels: Identifier[],
  sourceLine: number,
): ParsedInstr {
  const spaceIndex = text.indexOf(" ");
  const head = spaceIndex >= 0 ? text.slice(0, spaceIndex) : text;
  const operandText = spaceIndex >= 0 ? text.slice(spaceIndex + 1) : "";

  if (!isMnemonic(head)) {
    throw new AssembleError("MalformedInstruction", `未知の命令 '${head}'`, {
      sourceLine,
      mnemonic: head,
    });
  }

  const operands = splitOperands(operandText, sourceLine).map((token) =>
    classifyOperand(token, sourceLine),
  );
  const shape: readonly OperandKind[] = OPERAND_SHAPES[head];
  if (operands.length !== shape.length) {
    throw new AssembleError(
      "MalformedInstruction",
      `${head} のオペランドは ${shape.length} 個です (got: ${operands.length})`,
      { sourceLine, mnemonic: head },
    );
  }
  const args: OperandArgs = { registers: [], ints: [], symbols: [] };
  shape.forEach((kind, i) => {
    const operand = operands[i];
    if (operand.kind !== kind) {
      throw new AssembleError(
        "MalformedInstruction",
        `${head} の第 ${i + 1} オペランドは ${kind} である必要があります (got: '${operand.text}')`,
        { sourceLine, mnemonic: head, position: i },
      );
    }
    switch (operand.kind) {
      case "register":
        args.registers.push(operand.index);
        break;
      case "int":
        args.ints.push(operand.value);
        break;
      case "symbol":
        args.symbols.push(operand.name);
        break;
    }
  });

  return {
    mnemonic: head,
    operands,
    args,
    labels,
    sourceLine,
    text: operands.length > 0
      ? `${head} ${operands.map((o) => o.text).join(", ")}`
      : head,
  };
}

function parseDataLine(line: SourceLine): ParsedData {
  const { sourceLine, content } = line;
  const match = content.match(DATA_LINE_RE);
  if (!match) {
    throw new AssembleError(
      "MalformedData",
      "データ宣言は 'name: 整数' の形式である必要があります",
      { sourceLine },
    );
  }
  const [, name, literal] = match;
  if (looksLikeRegister(name)) {
    throw new AssembleError(
      "MalformedData",
      `'${name}' はデータシンボル名に使えません`,
      { sourceLine, symbol: name },
    );
  }
  if (!/^[+-]?\d+$/.test(literal)) {
    throw new AssembleError(
      "MalformedData",
      `'${name}' の初期値 '${literal}' が整数ではありません`,
      { sourceLine, symbol: name },
    );
  }
  const value = BigInt(literal);
  if (!fitsWord(value)) {
    throw new AssembleError(
      "MalformedData",
      `'${name}' の初期値が 64bit 符号付き整数の範囲外です`,
      { sourceLine, symbol: name },
    );
  }
  return { name, value, sourceLine };
}

// --- パス 1: 束縛の収集 ---

export function collectSymbols(parsed: ParsedSource): SymbolTable {
  const declarations: SymbolEntry[] = [
    ...parsed.labels.map(
      (l): SymbolEntry => ({
        name: l.name,
        kind: "label",
        address: l.pc,
        sourceLine: l.sourceLine,
      }),
    ),
    ...parsed.data.map(
      (d, address): SymbolEntry => ({
        name: d.name,
        kind: "data",
        address,
        sourceLine: d.sourceLine,
      }),
    ),
  ];
  // セクションの順序に関係なく、ソース上で後に現れた宣言を重複として報告する
  declarations.sort((a, b) => a.sourceLine - b.sourceLine);

  const table = new Map<Identifier, SymbolEntry>();
  for (const entry of declarations) {
    const prev = table.get(entry.name);
    if (prev) {
      throw new AssembleError(
        "DuplicateSymbol",
        `シンボル '${entry.name}' が重複しています`,
        {
          sourceLine: entry.sourceLine,
          symbol: entry.name,
          firstDeclaredAt: prev.sourceLine,
        },
      );
    }
    table.set(entry.name, Object.freeze(entry));
  }
  return table;
}

// --- パス 2: 参照の解決 ---

export function resolveInstructions(
  parsed: ParsedSource,
  symbols: SymbolTable,
): LocatedInstr[] {
  return parsed.instructions.map((item, pc) => {
    const instr = Object.freeze(resolveInstruction(item, symbols));
    return Object.freeze({
      pc,
      instr,
      labels: Object.freeze([...item.labels]),
      sourceLine: item.sourceLine,
      text: formatInstruction(instr),
    });
  });
}

// オペランドの形は parseInstruction で検査済み
function resolveInstruction(
  item: ParsedInstr,
  symbols: SymbolTable,
): Instruction {
  const { registers: r, ints, symbols: names } = item.args;
  const sym = (kind: SymbolKind) => lookupSymbol(item, names[0], kind, symbols);

  switch (item.mnemonic) {
    case "ADDRESS": {
      const entry = sym("data");
      return {
        op: "ADDRESS",
        dest: r[0],
        symbol: entry.name,
        address: entry.address,
      };
    }
    case "LOAD":
      return { op: "LOAD", dest: r[0], base: r[1], offset: ints[0] };
    case "STORE":
      return { op: "STORE", src: r[0], base: r[1], offset: ints[0] };
    case "ADD":
      return { op: "ADD", dest: r[0], left: r[1], right: r[2] };
    case "SUB":
      return { op: "SUB", dest: r[0], left: r[1], right: r[2] };
    case "SETIMM":
      return { op: "SETIMM", dest: r[0], value: ints[0] };
    case "BRANCH": {
      const entry = sym("label");
      return { op: "BRANCH", target: entry.name, targetPc: entry.address };
    }
    case "BRANCH_IF_ZERO": {
      const entry = sym("label");
      return {
        op: "BRANCH_IF_ZERO",
        cond: r[0],
        target: entry.name,
        targetPc: entry.address,
      };
    }
  }
}

function lookupSymbol(
  item: ParsedInstr,
  name: Identifier,
  kind: SymbolKind,
  symbols: SymbolTable,
): SymbolEntry {
  const entry = symbols.get(name);
  if (!entry) {
    throw new AssembleError("UndefinedSymbol", `未定義のシンボル '${name}'`, {
      sourceLine: item.sourceLine,
      symbol: name,
    });
  }
  if (entry.kind !== kind) {
    const message =
      kind === "label"
        ? `'${name}' はデータシンボルのため分岐先にできません`
        : `'${name}' はラベルのため ADDRESS で参照できません`;
    throw new AssembleError("MalformedInstruction", message, {
      sourceLine: item.sourceLine,
      symbol: name,
      mnemonic: item.mnemonic,
    });
  }
  return entry;
}

// --- 公開エントリ ---

/**
 * 2 パスでアセンブルする。
 * 失敗時は AssembleError を投げ、部分的なプログラムは返さない。
 */
export function assemble(source: string): Program {
  const parsed = parseSource(source);
  const symbols = collectSymbols(parsed);
  const instructions = resolveInstructions(parsed, symbols);
  const data: DataCell[] = parsed.data.map((d, address) =>
    Object.freeze({
      name: d.name,
      address,
      value: d.value,
      sourceLine: d.sourceLine,
    }),
  );

  return Object.freeze({
    instructions: Object.freeze(instructions),
    symbols,
    data: Object.freeze(data),
    memory: Object.freeze(data.map((d) => d.value)),
  });
}
