#!/usr/bin/env -S npx tsx
import { promises as fs } from "node:fs";
import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";
import { assemble, isAssembleErrorKind } from "../regasm-ast";
import { buildImages } from "../rom-image";
import { run, type RunOptions } from "../lib/run-engine";
import type { RunResult } from "../lib/run-schema";

const DEFAULT_TARGET = "rasm_case";

type CliOptions = {
  maxSteps?: number;
  memorySize?: number;
  trace: boolean;
  ram?: string;
  rom?: string;
};

type ParsedArgs = {
  options: CliOptions;
  targets: string[];
};

type RunFn = (source: string, options: RunOptions) => RunResult;

async function main() {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
    return;
  }
  const { options, targets } = parsed;
  const targetList = targets.length > 0 ? targets : [DEFAULT_TARGET];
  const files = await collectRasmFiles(targetList);
  if (files.length === 0) {
    console.error(".rasm ファイルが見つかりませんでした。");
    process.exit(1);
  }
  if ((options.ram || options.rom) && files.length !== 1) {
    console.error("--ram / --rom は単一ファイルを指定したときのみ使えます。");
    process.exit(1);
  }

  let hadFailure = false;
  for (const filePath of files) {
    const ok = await runSingleCase(filePath, options);
    if (!ok) hadFailure = true;
  }

  if (hadFailure) {
    process.exit(1);
  }
}

function parsePositiveInt(flag: string, value: string | undefined): number {
  const parsed = Number(value ?? "");
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${flag} は正の整数で指定してください (got: ${value ?? ""})`);
  }
  return parsed;
}

function parseArgs(argv: string[]): ParsedArgs {
  const options: CliOptions = { trace: false };
  const targets: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      targets.push(arg);
      continue;
    }

    // 値側の `=` はそのまま残す (--rom=out=1.txt)
    const eq = arg.indexOf("=");
    const [flag, maybeValue]: [string, string | undefined] =
      eq >= 0 ? [arg.slice(0, eq), arg.slice(eq + 1)] : [arg, undefined];

    switch (flag) {
      case "--max-steps":
        options.maxSteps = parsePositiveInt(flag, maybeValue ?? argv[++i]);
        break;
      case "--memory-size":
        options.memorySize = parsePositiveInt(flag, maybeValue ?? argv[++i]);
        break;
      case "--trace":
        options.trace = true;
        break;
      case "--ram":
      case "--rom": {
        const value = maybeValue ?? argv[++i];
        if (!value) {
          throw new Error(`${flag} には出力先のパスを指定してください`);
        }
        if (flag === "--ram") options.ram = value;
        else options.rom = value;
        break;
      }
      case "--help": {
        printUsage();
        process.exit(0);
        break;
      }
      default:
        throw new Error(`未知のフラグです: ${flag}`);
    }
  }

  return { options, targets };
}

function printUsage() {
  console.log(`レジスタマシン アセンブラ / インタプリタ
Usage: npx tsx scripts/run-regasm.ts [options] [file|dir ...]

Options:
  --max-steps <n>     実行ステップ数の上限 (default: 10000)
  --memory-size <n>   メモリのワード数 (default: .data の宣言数)
  --trace             1 命令ごとの実行トレースを表示
  --ram <path>        RAM イメージ (.data) を書き出す (単一ファイル時のみ)
  --rom <path>        ROM イメージ (.text) を書き出す (単一ファイル時のみ)
  --help              このヘルプを表示

引数を省略すると rasm_case/ 以下の全 .rasm を実行します。`);
}

async function collectRasmFiles(targets: string[]): Promise<string[]> {
  const collected = new Set<string>();
  for (const raw of targets) {
    const resolved = path.resolve(raw);
    try {
      const stats = await fs.stat(resolved);
      if (stats.isDirectory()) {
        await collectFromDir(resolved, collected);
      } else if (stats.isFile() && resolved.endsWith(".rasm")) {
        collected.add(resolved);
      }
    } catch (err) {
      console.error(`パスを解決できませんでした: ${raw}`);
      console.error(err);
    }
  }
  return Array.from(collected).sort();
}

async function collectFromDir(dir: string, acc: Set<string>) {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  await Promise.all(
    entries.map(async (entry) => {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await collectFromDir(fullPath, acc);
      } else if (entry.isFile() && entry.name.endsWith(".rasm")) {
        acc.add(fullPath);
      }
    }),
  );
}

async function runSingleCase(
  filePath: string,
  options: CliOptions,
  runFn: RunFn = run,
): Promise<boolean> {
  const relPath = path.relative(process.cwd(), filePath) || filePath;
  console.log(`\n=== ${relPath} ===`);

  let source: string;
  try {
    source = await fs.readFile(filePath, "utf8");
  } catch (err) {
    console.error("ファイルを読み込めませんでした", err);
    return false;
  }

  const result = runFn(source, {
    maxSteps: options.maxSteps,
    memorySize: options.memorySize,
    trace: options.trace,
  });
  printRunResult(result);

  // イメージはアセンブルできれば実行結果 (停止ループ・フォルト) に関係なく書き出す
  const assembled = !(result.error && isAssembleErrorKind(result.error.type));
  if (assembled && (options.ram || options.rom)) {
    try {
      await writeImages(source, options);
    } catch (err) {
      console.error("イメージを書き出せませんでした", err);
      return false;
    }
  }
  return result.error === undefined;
}

async function writeImages(source: string, options: CliOptions) {
  const images = buildImages(assemble(source));
  if (options.ram) {
    await fs.writeFile(options.ram, images.ram, "utf8");
    console.log(`ram image  : ${options.ram} (${images.ramBytes} bytes)`);
  }
  if (options.rom) {
    await fs.writeFile(options.rom, images.rom, "utf8");
    console.log(`rom image  : ${options.rom} (${images.romBytes} bytes)`);
  }
}

function printRunResult(result: RunResult) {
  console.log(`status     : ${result.status}`);
  console.log(`steps      : ${result.steps}`);

  for (const entry of result.trace.steps) {
    console.log(
      `  #${entry.stepId} pc=${entry.pc} ${entry.text.padEnd(28)} ${entry.description}`,
    );
  }

  const state = result.finalState;
  if (state) {
    console.log(`pc         : ${state.pc}`);
    const nonZero = Object.entries(state.registers).filter(([, v]) => v !== "0");
    console.log(
      `registers  : ${nonZero.length > 0 ? nonZero.map(([r, v]) => `${r}=${v}`).join(" ") : "(all zero)"}`,
    );
    for (const cell of state.memory) {
      console.log(`mem[${cell.address}]${cell.symbol ? ` ${cell.symbol}` : ""} = ${cell.value}`);
    }
  }

  if (result.error) {
    console.log(`error.type : ${result.error.type}`);
    console.log(`error.msg  : ${result.error.message}`);
  }
}

const isMain =
  process.argv[1] !== undefined &&
  path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isMain) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}

export { parseArgs, runSingleCase, collectRasmFiles };
