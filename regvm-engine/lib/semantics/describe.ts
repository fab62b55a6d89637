import { registerName } from "@/regasm-ast";
import type { StepEffect } from "./apply-instruction";

export function describeEffect(effect: StepEffect): string {
  switch (effect.kind) {
    case "register":
      return `${registerName(effect.register)} := ${effect.after}`;
    case "memory":
      return `mem[${effect.address}] := ${effect.after}`;
    case "branch":
      return effect.taken
        ? `branch -> ${effect.target}`
        : "branch not taken";
  }
}
