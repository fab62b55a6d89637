// テスト共通の参照プログラム

export const referenceSource = (donut: number, jumbo: number): string =>
  [
    ".text",
    "    ADDRESS X0, donut          # X0 = &donut",
    "    ADDRESS X1, jumbo",
    "    LOAD X2, X0, 0",
    "    LOAD X3, X1, 0",
    "    SUB X4, X3, X2",
    "    BRANCH_IF_ZERO X4, _amogus",
    "    STORE X4, X0, 0",
    "    BRANCH _end",
    "_amogus:",
    "    ADD X5, X2, X3",
    "    STORE X5, X0, 0",
    "_end:",
    "    SETIMM X6, 8",
    "",
    ".data",
    `donut: ${donut}`,
    `jumbo: ${jumbo}`,
    "",
  ].join("\n");

export const REFERENCE_SOURCE = referenceSource(5, 5);
