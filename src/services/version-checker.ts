import { readFileSync } from "node:fs";
import type { Logger } from "pino";
import type { Version } from "../version/version.js";
import { tryParse, type ParseResult, type VersionParser } from "../parser/parsers.js";

export interface CheckEntry {
  /** 1-based line number in the checked text. */
  line: number;
  input: string;
  result: ParseResult<Version>;
}

export interface CheckReport {
  entries: CheckEntry[];
  valid: number;
  invalid: number;
}

export class VersionChecker {
  private readonly parser: VersionParser;
  private readonly log: Logger;

  constructor(parser: VersionParser, log: Logger) {
    this.parser = parser;
    this.log = log.child({ component: "version-checker", parser: parser.kind });
  }

  check(input: string): ParseResult<Version> {
    const result = tryParse(() => this.parser.parseVersion(input));
    if (result.ok) {
      this.log.debug({ input, kind: result.value.kind }, "accepted version");
    } else {
      this.log.debug(
        { input, reason: result.error.kind, cursor: result.error.cursor },
        "rejected version",
      );
    }
    return result;
  }

  /** Check every line that is neither blank nor a `#` comment. */
  checkLines(text: string): CheckReport {
    const entries: CheckEntry[] = [];
    let valid = 0;
    let invalid = 0;

    text.split(/\r?\n/).forEach((raw, index) => {
      if (raw.trim() === "" || raw.trimStart().startsWith("#")) return;
      const result = this.check(raw);
      if (result.ok) valid++;
      else invalid++;
      entries.push({ line: index + 1, input: raw, result });
    });

    if (invalid > 0) {
      this.log.warn({ valid, invalid }, "rejected versions found");
    } else {
      this.log.info({ valid }, "all versions accepted");
    }

    return { entries, valid, invalid };
  }

  checkFile(path: string): CheckReport {
    this.log.debug({ path }, "reading versions");
    return this.checkLines(readFileSync(path, "utf-8"));
  }
}
