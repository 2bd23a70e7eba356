import { MAX_COMPONENT } from "../version/component.js";
import type { ByteCursor } from "./byte-cursor.js";
import { VersionParseError } from "./errors.js";

const DOT = 0x2e;
const ZERO = 0x30;
const NINE = 0x39;

export function isDigit(byte: number): boolean {
  return byte >= ZERO && byte <= NINE;
}

export type NumericFault = "leading_zero" | "overflow";

/**
 * Digit-by-digit accumulator for one version component.
 *
 * Once a lone `0` has been recorded nothing may follow it, and the value
 * never exceeds {@link MAX_COMPONENT}.
 */
export class NumberComponent {
  private current: bigint | undefined;

  get value(): bigint | undefined {
    return this.current;
  }

  /** Append a digit (0-9). The accumulator is left unchanged on a fault. */
  push(digit: number): NumericFault | undefined {
    if (this.current === undefined) {
      this.current = BigInt(digit);
      return undefined;
    }
    if (this.current === 0n) {
      return "leading_zero";
    }
    const next = this.current * 10n + BigInt(digit);
    if (next > MAX_COMPONENT) {
      return "overflow";
    }
    this.current = next;
    return undefined;
  }
}

/**
 * Consume the longest run of ASCII digits at the cursor and return its value.
 *
 * A leading zero is reported at the start of the component; an overflow
 * carries no cursor.
 */
export function parseComponent(cursor: ByteCursor): bigint {
  const start = cursor.offset;
  const component = new NumberComponent();

  for (let byte = cursor.peek(); byte !== undefined && isDigit(byte); byte = cursor.peek()) {
    const fault = component.push(byte - ZERO);
    if (fault === "leading_zero") {
      throw new VersionParseError(cursor.bytes, { kind: "leading_zero" }, start);
    }
    if (fault === "overflow") {
      throw new VersionParseError(cursor.bytes, { kind: "overflow" });
    }
    cursor.advance();
  }

  if (component.value === undefined) {
    throw new VersionParseError(
      cursor.bytes,
      { kind: "expected_numeric_token", got: cursor.peek() ?? null },
      cursor.offset,
    );
  }
  return component.value;
}

/** Consume a single `.`; the cursor does not move on failure. */
export function parseDot(cursor: ByteCursor): void {
  const byte = cursor.peek();
  if (byte !== DOT) {
    throw new VersionParseError(
      cursor.bytes,
      { kind: "expected_separator", got: byte ?? null },
      cursor.offset,
    );
  }
  cursor.advance();
}

export function peekIsDot(cursor: ByteCursor): boolean {
  return cursor.peek() === DOT;
}

export function expectEnd(cursor: ByteCursor): void {
  if (!cursor.isDone()) {
    throw new VersionParseError(
      cursor.bytes,
      { kind: "expected_end_of_input", extra: cursor.remaining() },
      cursor.offset,
    );
  }
}
