export { buildImages, type ProgramImages } from "./lib/build-images";
export {
  ImageBuilder,
  IMAGE_HEADER,
  IMAGE_SIZE,
  ROW_WIDTH,
} from "./lib/image-builder";
export {
  encodeInstruction,
  operandBytes,
  opcodeOf,
  toByte,
  INSTRUCTION_BYTES,
} from "./lib/encode-instruction";
export { ImageEncodeError, type ImageEncodeErrorKind } from "./lib/errors";
