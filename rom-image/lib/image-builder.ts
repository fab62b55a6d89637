import { ImageEncodeError } from "./errors";

export const IMAGE_SIZE = 256;
export const ROW_WIDTH = 16;
export const IMAGE_HEADER = "v3.0 hex words addressed";

const hex2 = (value: number) => value.toString(16).padStart(2, "0");

/**
 * Logisim の RAM/ROM イメージファイル相当の 256 バイト領域。
 * 先頭から順に詰めて書き込み、16 バイトごとに 1 行で出力する。
 */
export class ImageBuilder {
  private readonly bytes = new Uint8Array(IMAGE_SIZE);
  private cursor = 0;

  /** 書き込んだ先頭アドレスを返す */
  writeBytes(bytes: ArrayLike<number>): number {
    if (this.cursor + bytes.length > IMAGE_SIZE) {
      throw new ImageEncodeError(
        "ImageOverflow",
        `イメージに収まりません (${IMAGE_SIZE} バイトまで)`,
        { at: this.cursor, length: bytes.length },
      );
    }
    const start = this.cursor;
    this.bytes.set(bytes, start);
    this.cursor += bytes.length;
    return start;
  }

  get used(): number {
    return this.cursor;
  }

  byteAt(address: number): number {
    return this.bytes[address] ?? 0;
  }

  toText(): string {
    const lines = [IMAGE_HEADER];
    for (let row = 0; row < IMAGE_SIZE; row += ROW_WIDTH) {
      const cells = Array.from(this.bytes.subarray(row, row + ROW_WIDTH), hex2);
      lines.push(`${hex2(row)}: ${cells.join(" ")}`);
    }
    return `${lines.join("\n")}\n`;
  }
}
