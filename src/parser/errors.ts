import { TextDecoder } from "node:util";
import { MAX_COMPONENT } from "../version/component.js";
import { renderUnderline } from "./underline.js";

// ---------------------------------------------------------------------------
// Reasons
// ---------------------------------------------------------------------------

export type ParseErrorReason =
  | { kind: "expected_numeric_token"; got: number | null }
  | { kind: "leading_zero" }
  | { kind: "overflow" }
  | { kind: "expected_separator"; got: number | null }
  | { kind: "expected_end_of_input"; extra: Uint8Array };

export type ParseErrorKind = ParseErrorReason["kind"];

/** Printable ASCII as-is, everything else as `\xNN`. */
export function formatByte(byte: number): string {
  if (byte >= 0x20 && byte <= 0x7e) {
    return String.fromCharCode(byte);
  }
  return `\\x${byte.toString(16).padStart(2, "0")}`;
}

function formatToken(byte: number | null): string {
  return byte === null ? "end of input" : `'${formatByte(byte)}'`;
}

export function describeReason(reason: ParseErrorReason): string {
  switch (reason.kind) {
    case "expected_numeric_token":
      return `Expected numeric token (0-9), but got ${formatToken(reason.got)}`;
    case "leading_zero":
      return "Number may not start with a leading zero, unless the complete component is '0'";
    case "overflow":
      return `Overflow: Found number component which would be larger than the maximum supported number (max=${MAX_COMPONENT})`;
    case "expected_separator":
      return `Expected dot token '.', but got ${formatToken(reason.got)}`;
    case "expected_end_of_input":
      return `Expected end of input, but got: '${Array.from(reason.extra, formatByte).join("")}'`;
  }
}

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

const decoder = new TextDecoder();
const MESSAGE_PREFIX = "Unable to parse '";

// Code points, not UTF-16 units or UTF-8 bytes
function charCount(text: string): number {
  return Array.from(text).length;
}

/**
 * A rejected parse: the input (decoded, invalid UTF-8 replaced), the byte
 * offset the failure was detected at, and why. The marker line is measured
 * in characters of the decoded input, not in bytes.
 *
 * `message` is a single line. Use {@link VersionParseError.toDisplayString}
 * for the message with a caret under the offending byte.
 */
export class VersionParseError extends Error {
  readonly input: string;
  readonly cursor: number | undefined;
  readonly reason: ParseErrorReason;
  /** Column of the cursor within `input`, counted in characters. */
  private readonly column: number | undefined;

  constructor(bytes: Uint8Array, reason: ParseErrorReason, cursor?: number) {
    const input = decoder.decode(bytes);
    super(`${MESSAGE_PREFIX}${input}' to a version number: ${describeReason(reason)}`);
    this.name = "VersionParseError";
    this.input = input;
    this.reason = reason;
    this.cursor = cursor === undefined ? undefined : Math.min(cursor, bytes.length);
    this.column =
      this.cursor === undefined ? undefined : charCount(decoder.decode(bytes.subarray(0, this.cursor)));
  }

  get kind(): ParseErrorKind {
    return this.reason.kind;
  }

  /** The input and a marker line beneath it, or `undefined` without a cursor. */
  annotate(): string | undefined {
    if (this.column === undefined) return undefined;
    return `${this.input}\n${renderUnderline(charCount(this.input), this.column)}`;
  }

  toDisplayString(): string {
    if (this.column === undefined) return this.message;
    return `${this.message}\n${renderUnderline(charCount(this.input), this.column, MESSAGE_PREFIX.length)}`;
  }
}

/** A typestate parser stage was used again after it had already advanced. */
export class ParserStateConsumedError extends Error {
  constructor(message = "Parser state has already been consumed by a previous transition") {
    super(message);
    this.name = "ParserStateConsumedError";
  }
}
