export type ImageEncodeErrorKind = "ImageOverflow" | "OperandRange";

export class ImageEncodeError extends Error {
  kind: ImageEncodeErrorKind;
  detail?: unknown;

  constructor(kind: ImageEncodeErrorKind, message: string, detail?: unknown) {
    super(message);
    this.name = "ImageEncodeError";
    this.kind = kind;
    this.detail = detail;
  }
}
