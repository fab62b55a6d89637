export { applyInstruction, type StepEffect } from "./apply-instruction";
export { describeEffect } from "./describe";
