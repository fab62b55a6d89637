export type MemoryAccess = "load" | "store";

/** LOAD / STORE の実効アドレスが確保済みメモリの外を指したときの実行時フォルト */
export class MemoryFault extends Error {
  pc: number;
  address: bigint;
  access: MemoryAccess;
  memorySize: number;

  constructor(
    pc: number,
    address: bigint,
    access: MemoryAccess,
    memorySize: number,
  ) {
    super(
      `メモリ範囲外への ${access}: address=${address} (size=${memorySize}, pc=${pc})`,
    );
    this.name = "MemoryFault";
    this.pc = pc;
    this.address = address;
    this.access = access;
    this.memorySize = memorySize;
  }
}

export class OptionsError extends Error {
  detail?: unknown;

  constructor(message: string, detail?: unknown) {
    super(message);
    this.name = "OptionsError";
    this.detail = detail;
  }
}
