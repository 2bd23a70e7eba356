import type { BaseVersion } from "../version/base-version.js";
import type { FullVersion } from "../version/full-version.js";
import type { Version } from "../version/version.js";
import type { ParserInput } from "./byte-cursor.js";
import { VersionParseError } from "./errors.js";
import { UnparsedParser } from "./incremental.js";
import { OneShotParser } from "./one-shot.js";

export type ParserKind = "incremental" | "one-shot";

/** Common surface over both parser implementations. */
export interface VersionParser {
  readonly kind: ParserKind;
  parseVersion(input: ParserInput): Version;
  parseBase(input: ParserInput): BaseVersion;
  parseFull(input: ParserInput): FullVersion;
}

export const incrementalParser: VersionParser = {
  kind: "incremental",
  parseVersion: (input) => UnparsedParser.from(input).parse(),
  parseBase: (input) => UnparsedParser.from(input).parseBase().finishBaseVersion(),
  parseFull: (input) => UnparsedParser.from(input).parseFull().finishFullVersion(),
};

export const oneShotParser: VersionParser = {
  kind: "one-shot",
  parseVersion: (input) => OneShotParser.from(input).parse(),
  parseBase: (input) => OneShotParser.from(input).parseBase(),
  parseFull: (input) => OneShotParser.from(input).parseFull(),
};

export function getParser(kind: ParserKind): VersionParser {
  return kind === "one-shot" ? oneShotParser : incrementalParser;
}

// ---------------------------------------------------------------------------
// Result-returning variants
// ---------------------------------------------------------------------------

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: VersionParseError };

/** Run a parse, returning rejections as values. Any other error propagates. */
export function tryParse<T>(parse: () => T): ParseResult<T> {
  try {
    return { ok: true, value: parse() };
  } catch (err) {
    if (err instanceof VersionParseError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

export function parseVersion(input: ParserInput): Version {
  return incrementalParser.parseVersion(input);
}

export function parseBase(input: ParserInput): BaseVersion {
  return incrementalParser.parseBase(input);
}

export function parseFull(input: ParserInput): FullVersion {
  return incrementalParser.parseFull(input);
}

export function tryParseVersion(input: ParserInput): ParseResult<Version> {
  return tryParse(() => parseVersion(input));
}
