import { describe, it, expect } from "vitest";
import { UnparsedParser } from "../../src/parser/incremental.js";
import { ParserStateConsumedError, VersionParseError } from "../../src/parser/errors.js";
import { toBytes } from "../../src/parser/byte-cursor.js";
import { BaseVersion } from "../../src/version/base-version.js";
import { FullVersion } from "../../src/version/full-version.js";

function rejectionOf(fn: () => unknown): VersionParseError {
  try {
    fn();
  } catch (err) {
    if (err instanceof VersionParseError) return err;
    throw err;
  }
  throw new Error("expected a VersionParseError");
}

describe("UnparsedParser.parseBase", () => {
  it.each([
    ["0.0", 0, 0],
    ["1.0", 1, 0],
    ["1.1", 1, 1],
  ])("reads %s", (input, major, minor) => {
    const base = UnparsedParser.fromString(input).parseBase();
    expect(base.inner.equals(new BaseVersion(major, minor))).toBe(true);

    const version = base.finish();
    expect(version).toBeInstanceOf(BaseVersion);
    expect(version.toString()).toBe(input);
  });

  it("leaves trailing input for the next stage", () => {
    const base = UnparsedParser.fromString("1.2.3").parseBase();
    expect(base.inner.toString()).toBe("1.2");

    const err = rejectionOf(() => base.finishBaseVersion());
    expect(err.reason).toEqual({ kind: "expected_end_of_input", extra: toBytes(".3") });
    expect(err.cursor).toBe(3);
  });

  it("rejects empty input", () => {
    const err = rejectionOf(() => UnparsedParser.fromString("").parseBase());
    expect(err.reason).toEqual({ kind: "expected_numeric_token", got: null });
  });

  it("rejects a missing minor component", () => {
    const err = rejectionOf(() => UnparsedParser.fromString("1.").parseBase());
    expect(err.reason).toEqual({ kind: "expected_numeric_token", got: null });
    expect(err.cursor).toBe(2);
  });

  it.each(["00.0", "01.0", "1.01"])("rejects the leading zero in %s", (input) => {
    const err = rejectionOf(() => UnparsedParser.fromString(input).parseBase());
    expect(err.kind).toBe("leading_zero");
  });

  it("rejects overflow in the minor component", () => {
    const err = rejectionOf(() =>
      UnparsedParser.fromString("18446744073709551615.18446744073709551616").parseBase(),
    );
    expect(err.kind).toBe("overflow");
  });

  it("reads raw bytes", () => {
    const base = UnparsedParser.fromBytes(new Uint8Array([0x37, 0x2e, 0x38])).parseBase();
    expect(base.finishBaseVersion().toString()).toBe("7.8");
  });

  it("is not affected by later writes to the caller's buffer", () => {
    const buffer = toBytes("1.2.3");
    const base = UnparsedParser.fromBytes(buffer).parseBase();
    buffer[4] = 0x78;
    expect(base.parsePatch().finishFullVersion().toString()).toBe("1.2.3");
  });
});

describe("BaseParsedParser.parsePatch", () => {
  it("continues to a full version", () => {
    const full = UnparsedParser.fromString("1.2.3").parseBase().parsePatch();
    expect(full.inner.equals(new FullVersion(1, 2, 3))).toBe(true);
    expect(full.finishFullVersion().toString()).toBe("1.2.3");
  });

  it("checks for trailing input on finish", () => {
    const full = UnparsedParser.fromString("1.2.3.4").parseFull();
    const err = rejectionOf(() => full.finish());
    expect(err.reason).toEqual({ kind: "expected_end_of_input", extra: toBytes(".4") });
    expect(err.cursor).toBe(5);
  });

  it("requires the separator", () => {
    const err = rejectionOf(() => UnparsedParser.fromString("1.2").parseFull());
    expect(err.reason).toEqual({ kind: "expected_separator", got: null });
    expect(err.cursor).toBe(3);
  });
});

describe("BaseParsedParser.parsePatchOrFinish", () => {
  it("finishes as a base version without a dot", () => {
    const version = UnparsedParser.fromString("1.2").parseBase().parsePatchOrFinish();
    expect(version.kind).toBe("base");
    expect(version.toString()).toBe("1.2");
  });

  it("continues to the patch after a dot", () => {
    const version = UnparsedParser.fromString("1.2.3").parseBase().parsePatchOrFinish();
    expect(version.kind).toBe("full");
    expect(version.toString()).toBe("1.2.3");
  });

  it("does not consume the byte it peeked at", () => {
    const err = rejectionOf(() =>
      UnparsedParser.fromString("1.2x").parseBase().parsePatchOrFinish(),
    );
    expect(err.reason).toEqual({ kind: "expected_end_of_input", extra: toBytes("x") });
    expect(err.cursor).toBe(3);
  });
});

describe("UnparsedParser.parse", () => {
  it("picks the shape from the input", () => {
    expect(UnparsedParser.fromString("1.2").parse().kind).toBe("base");
    expect(UnparsedParser.fromString("1.2.3").parse().kind).toBe("full");
  });

  it("rejects a trailing dot", () => {
    const err = rejectionOf(() => UnparsedParser.fromString("1.2.").parse());
    expect(err.reason).toEqual({ kind: "expected_numeric_token", got: null });
    expect(err.cursor).toBe(4);
  });

  it("rejects junk after the minor component as a missing separator", () => {
    const err = rejectionOf(() => UnparsedParser.fromString("1.2x").parse());
    expect(err.reason).toEqual({ kind: "expected_separator", got: 0x78 });
  });
});

describe("stage consumption", () => {
  it("refuses a second transition from the same stage", () => {
    const unparsed = UnparsedParser.fromString("1.2");
    expect(unparsed.consumed).toBe(false);

    const base = unparsed.parseBase();
    expect(unparsed.consumed).toBe(true);
    expect(() => unparsed.parseBase()).toThrow(ParserStateConsumedError);
    expect(() => unparsed.parse()).toThrow(ParserStateConsumedError);

    base.finish();
    expect(base.consumed).toBe(true);
    expect(() => base.finish()).toThrow(ParserStateConsumedError);
    expect(() => base.parsePatchOrFinish()).toThrow(ParserStateConsumedError);
  });

  it("consumes the stage even when the transition fails", () => {
    const unparsed = UnparsedParser.fromString("x");
    expect(() => unparsed.parseBase()).toThrow(VersionParseError);
    expect(() => unparsed.parseBase()).toThrow(ParserStateConsumedError);
  });

  it("keeps the parsed value readable after finishing", () => {
    const full = UnparsedParser.fromString("3.2.1").parseFull();
    full.finishFullVersion();
    expect(full.inner.toString()).toBe("3.2.1");
  });
});
