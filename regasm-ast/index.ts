export * from "./types/operand";
export * from "./types/instruction";
export * from "./types/parsed";
export * from "./types/program";
export {
  assemble,
  parseSource,
  collectSymbols,
  resolveInstructions,
  isMnemonic,
} from "./lib/assembler";
export {
  AssembleError,
  ASSEMBLE_ERROR_KINDS,
  isAssembleError,
  isAssembleErrorKind,
} from "./lib/errors";
export type { AssembleErrorKind, AssembleErrorDetail } from "./lib/errors";
export { formatInstruction } from "./lib/format";
export {
  REGISTER_COUNT,
  WORD_BITS,
  WORD_MIN,
  WORD_MAX,
  fitsWord,
  parseRegister,
  registerName,
} from "./lib/machine";
