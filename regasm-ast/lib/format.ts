import type { Instruction } from "../types/instruction";
import { registerName as r } from "./machine";

// 解決済み命令を正規化したテキストに戻す (トレース・CLI 表示用)
export function formatInstruction(instr: Instruction): string {
  switch (instr.op) {
    case "ADDRESS":
      return `ADDRESS ${r(instr.dest)}, ${instr.symbol}`;
    case "LOAD":
      return `LOAD ${r(instr.dest)}, ${r(instr.base)}, ${instr.offset}`;
    case "STORE":
      return `STORE ${r(instr.src)}, ${r(instr.base)}, ${instr.offset}`;
    case "ADD":
    case "SUB":
      return `${instr.op} ${r(instr.dest)}, ${r(instr.left)}, ${r(instr.right)}`;
    case "SETIMM":
      return `SETIMM ${r(instr.dest)}, ${instr.value}`;
    case "BRANCH":
      return `BRANCH ${instr.target}`;
    case "BRANCH_IF_ZERO":
      return `BRANCH_IF_ZERO ${r(instr.cond)}, ${instr.target}`;
  }
}
