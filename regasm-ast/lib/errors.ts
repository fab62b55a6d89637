export const ASSEMBLE_ERROR_KINDS = [
  "UndefinedSymbol",
  "DuplicateSymbol",
  "MalformedInstruction",
  "MalformedData",
  "SectionError",
] as const;

export type AssembleErrorKind = (typeof ASSEMBLE_ERROR_KINDS)[number];

const ASSEMBLE_ERROR_KIND_SET: ReadonlySet<string> = new Set(ASSEMBLE_ERROR_KINDS);

export type AssembleErrorDetail = {
  sourceLine?: number;
  [key: string]: unknown;
};

export class AssembleError extends Error {
  kind: AssembleErrorKind;
  detail: AssembleErrorDetail;

  constructor(
    kind: AssembleErrorKind,
    message: string,
    detail: AssembleErrorDetail = {},
  ) {
    super(message);
    this.name = "AssembleError";
    this.kind = kind;
    this.detail = detail;
  }
}

export function isAssembleError(err: unknown): err is AssembleError {
  return err instanceof AssembleError;
}

export function isAssembleErrorKind(type: string): type is AssembleErrorKind {
  return ASSEMBLE_ERROR_KIND_SET.has(type);
}
