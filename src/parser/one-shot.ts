import { BaseVersion } from "../version/base-version.js";
import { FullVersion } from "../version/full-version.js";
import type { Version } from "../version/version.js";
import { ByteCursor, toBytes, type ParserInput } from "./byte-cursor.js";
import { expectEnd, parseComponent, parseDot } from "./component.js";

/**
 * Parses a whole version in one call, walking a single cursor over the input.
 * Whether the result has two or three components depends only on whether any
 * input is left after the minor component.
 */
export class OneShotParser {
  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  static fromBytes(bytes: Uint8Array): OneShotParser {
    return new OneShotParser(toBytes(bytes));
  }

  static fromString(input: string): OneShotParser {
    return new OneShotParser(toBytes(input));
  }

  static from(input: ParserInput): OneShotParser {
    return new OneShotParser(toBytes(input));
  }

  parse(): Version {
    const cursor = new ByteCursor(this.bytes);
    const [major, minor] = scanBase(cursor);

    if (cursor.isDone()) {
      return new BaseVersion(major, minor);
    }

    parseDot(cursor);
    const patch = parseComponent(cursor);
    expectEnd(cursor);

    return new FullVersion(major, minor, patch);
  }

  /** Exactly `MAJOR.MINOR`; a trailing `.PATCH` is rejected as extra input. */
  parseBase(): BaseVersion {
    const cursor = new ByteCursor(this.bytes);
    const [major, minor] = scanBase(cursor);
    expectEnd(cursor);
    return new BaseVersion(major, minor);
  }

  /** Exactly `MAJOR.MINOR.PATCH`. */
  parseFull(): FullVersion {
    const cursor = new ByteCursor(this.bytes);
    const [major, minor] = scanBase(cursor);
    parseDot(cursor);
    const patch = parseComponent(cursor);
    expectEnd(cursor);
    return new FullVersion(major, minor, patch);
  }
}

function scanBase(cursor: ByteCursor): [bigint, bigint] {
  const major = parseComponent(cursor);
  parseDot(cursor);
  const minor = parseComponent(cursor);
  return [major, minor];
}
