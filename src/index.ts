export { BaseVersion } from "./version/base-version.js";
export { FullVersion } from "./version/full-version.js";
export { MAX_COMPONENT, type ComponentInput } from "./version/component.js";
export {
  compareVersions,
  isVariant,
  patchOf,
  versionFromTuple,
  versionsEqual,
  type Variant,
  type Version,
} from "./version/version.js";

export { toBytes, type ParserInput } from "./parser/byte-cursor.js";
export {
  VersionParseError,
  ParserStateConsumedError,
  describeReason,
  type ParseErrorKind,
  type ParseErrorReason,
} from "./parser/errors.js";
export { renderUnderline } from "./parser/underline.js";
export { OneShotParser } from "./parser/one-shot.js";
export { UnparsedParser, BaseParsedParser, FullParsedParser } from "./parser/incremental.js";
export {
  getParser,
  incrementalParser,
  oneShotParser,
  parseBase,
  parseFull,
  parseVersion,
  tryParse,
  tryParseVersion,
  type ParseResult,
  type ParserKind,
  type VersionParser,
} from "./parser/parsers.js";

export { VersionChecker, type CheckEntry, type CheckReport } from "./services/version-checker.js";
export { VERSION } from "./version.js";
