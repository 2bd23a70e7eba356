import { TextEncoder } from "node:util";

const encoder = new TextEncoder();

export type ParserInput = string | Uint8Array;

/** Encode a string as UTF-8, or copy a byte buffer so later writes to it are not seen. */
export function toBytes(input: ParserInput): Uint8Array {
  return typeof input === "string" ? encoder.encode(input) : input.slice();
}

/**
 * A read position over a byte buffer. The offset only ever moves forward,
 * one byte at a time.
 */
export class ByteCursor {
  readonly bytes: Uint8Array;
  private position = 0;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  get offset(): number {
    return this.position;
  }

  /** The byte at the cursor, or `undefined` at end of input. */
  peek(): number | undefined {
    return this.position < this.bytes.length ? this.bytes[this.position] : undefined;
  }

  advance(): void {
    if (this.position < this.bytes.length) {
      this.position += 1;
    }
  }

  isDone(): boolean {
    return this.position >= this.bytes.length;
  }

  /** Owned copy of every byte not consumed yet. */
  remaining(): Uint8Array {
    return this.bytes.slice(this.position);
  }
}
