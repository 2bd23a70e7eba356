import { BaseVersion } from "../version/base-version.js";
import { FullVersion } from "../version/full-version.js";
import type { Version } from "../version/version.js";
import { ByteCursor, toBytes, type ParserInput } from "./byte-cursor.js";
import { expectEnd, parseComponent, parseDot, peekIsDot } from "./component.js";
import { ParserStateConsumedError } from "./errors.js";

/**
 * Shared plumbing for the parser stages. A stage owns the cursor until it
 * transitions; the transition hands the cursor to the next stage and leaves
 * this one unusable.
 */
abstract class ParserStage {
  private live: ByteCursor | undefined;

  protected constructor(cursor: ByteCursor) {
    this.live = cursor;
  }

  /** True once a transition has taken this stage's cursor. */
  get consumed(): boolean {
    return this.live === undefined;
  }

  protected get cursor(): ByteCursor {
    if (this.live === undefined) {
      throw new ParserStateConsumedError();
    }
    return this.live;
  }

  protected consume(): ByteCursor {
    const cursor = this.cursor;
    this.live = undefined;
    return cursor;
  }
}

/**
 * Entry stage of the incremental parser. Nothing has been read yet.
 *
 * ```ts
 * const version = UnparsedParser.fromString("1.2").parseBase().finishBaseVersion();
 * ```
 */
export class UnparsedParser extends ParserStage {
  private constructor(cursor: ByteCursor) {
    super(cursor);
  }

  /** The buffer is copied; later writes to it do not affect the parse. */
  static fromBytes(bytes: Uint8Array): UnparsedParser {
    return new UnparsedParser(new ByteCursor(toBytes(bytes)));
  }

  static fromString(input: string): UnparsedParser {
    return new UnparsedParser(new ByteCursor(toBytes(input)));
  }

  static from(input: ParserInput): UnparsedParser {
    return new UnparsedParser(new ByteCursor(toBytes(input)));
  }

  /**
   * Read `MAJOR.MINOR`. Anything after the minor component is left for the
   * next stage to accept or reject.
   */
  parseBase(): BaseParsedParser {
    const cursor = this.consume();
    const major = parseComponent(cursor);
    parseDot(cursor);
    const minor = parseComponent(cursor);
    return BaseParsedParser.create(cursor, new BaseVersion(major, minor));
  }

  /** Read `MAJOR.MINOR.PATCH`; a two-component input is rejected. */
  parseFull(): FullParsedParser {
    return this.parseBase().parsePatch();
  }

  /** Two or three components, whichever the input holds. */
  parse(): Version {
    const base = this.parseBase();
    if (base.atEnd()) {
      return base.finish();
    }
    return base.parsePatch().finish();
  }
}

export class BaseParsedParser extends ParserStage {
  /** The version read so far. Not valid until {@link finish} succeeds. */
  readonly inner: BaseVersion;

  private constructor(cursor: ByteCursor, inner: BaseVersion) {
    super(cursor);
    this.inner = inner;
  }

  /** @internal */
  static create(cursor: ByteCursor, inner: BaseVersion): BaseParsedParser {
    return new BaseParsedParser(cursor, inner);
  }

  /** @internal */
  atEnd(): boolean {
    return this.cursor.isDone();
  }

  parsePatch(): FullParsedParser {
    const cursor = this.consume();
    parseDot(cursor);
    const patch = parseComponent(cursor);
    return FullParsedParser.create(
      cursor,
      new FullVersion(this.inner.major, this.inner.minor, patch),
    );
  }

  /**
   * Continue with the patch component when a `.` follows, otherwise finish
   * as a base version. The lookahead does not consume input.
   */
  parsePatchOrFinish(): Version {
    if (peekIsDot(this.cursor)) {
      return this.parsePatch().finish();
    }
    return this.finish();
  }

  finish(): Version {
    return this.finishBaseVersion();
  }

  finishBaseVersion(): BaseVersion {
    expectEnd(this.consume());
    return this.inner;
  }
}

export class FullParsedParser extends ParserStage {
  /** The version read so far. Not valid until {@link finish} succeeds. */
  readonly inner: FullVersion;

  private constructor(cursor: ByteCursor, inner: FullVersion) {
    super(cursor);
    this.inner = inner;
  }

  /** @internal */
  static create(cursor: ByteCursor, inner: FullVersion): FullParsedParser {
    return new FullParsedParser(cursor, inner);
  }

  finish(): Version {
    return this.finishFullVersion();
  }

  finishFullVersion(): FullVersion {
    expectEnd(this.consume());
    return this.inner;
  }
}
