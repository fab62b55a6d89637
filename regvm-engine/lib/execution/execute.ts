import type { LocatedInstr, Program } from "@/regasm-ast";
import { initState, type MachineState } from "../core/state";
import { MemoryFault } from "../core/faults";
import { applyInstruction, type StepEffect } from "../semantics";
import { normalizeExecuteOptions, type ExecuteOptions } from "../options";

export type TraceStep = {
  stepId: number;
  pc: number;
  text: string;
  effect: StepEffect;
};

type ExecutionOutcome = {
  state: MachineState;
  steps: number;
  trace: TraceStep[];
};

export type ExecutionResult =
  | (ExecutionOutcome & { status: "halted" })
  | (ExecutionOutcome & { status: "faulted"; fault: MemoryFault })
  | (ExecutionOutcome & { status: "step-limit" });

export type ExecutionStatus = ExecutionResult["status"];

// PC が命令列の末尾を越えたら正常停止 (HALT 命令は無い)
export function isHalted(state: MachineState, program: Program): boolean {
  return state.pc >= program.instructions.length;
}

export function fetchInstruction(
  state: MachineState,
  program: Program,
): LocatedInstr {
  const located = program.instructions[state.pc];
  if (!located) {
    throw new Error(`no instruction at pc=${state.pc}`);
  }
  return located;
}

/** 1 命令だけ実行する。MemoryFault はそのまま投げる */
export function step(
  state: MachineState,
  program: Program,
  stepId = 0,
): TraceStep {
  const located = fetchInstruction(state, program);
  const effect = applyInstruction(state, located.instr);
  return { stepId, pc: located.pc, text: located.text, effect };
}

export function execute(
  program: Program,
  options: ExecuteOptions = {},
): ExecutionResult {
  const opts = normalizeExecuteOptions(options, program);
  const state = initState(program, opts.memorySize);
  const trace: TraceStep[] = [];
  let steps = 0;

  while (!isHalted(state, program)) {
    if (steps >= opts.maxSteps) {
      return { status: "step-limit", state, steps, trace };
    }

    let executed: TraceStep;
    try {
      executed = step(state, program, steps + 1);
    } catch (err) {
      if (err instanceof MemoryFault) {
        return { status: "faulted", state, steps, fault: err, trace };
      }
      throw err;
    }

    steps += 1;
    if (opts.trace) {
      trace.push(executed);
    }
  }

  return { status: "halted", state, steps, trace };
}
