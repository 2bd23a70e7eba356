import type { Logger } from "pino";
import type { Config } from "./config.js";
import type { VersionParseError } from "./parser/errors.js";
import { tryParse, type VersionParser } from "./parser/parsers.js";
import { VersionChecker } from "./services/version-checker.js";
import { compareVersions } from "./version/version.js";

export interface CommandContext {
  config: Config;
  parser: VersionParser;
  log: Logger;
}

export interface CommandOutput {
  stdout: string[];
  stderr: string[];
  exitCode: number;
}

function failureFields(error: VersionParseError): {
  reason: string;
  cursor: number | null;
  message: string;
} {
  return {
    reason: error.kind,
    cursor: error.cursor ?? null,
    message: error.message,
  };
}

function describeFailure(error: VersionParseError, annotate: boolean): string {
  return annotate ? error.toDisplayString() : error.message;
}

// ---------------------------------------------------------------------------
// parse
// ---------------------------------------------------------------------------

export function runParse(inputs: string[], ctx: CommandContext): CommandOutput {
  const out: CommandOutput = { stdout: [], stderr: [], exitCode: 0 };
  if (inputs.length === 0) {
    out.stderr.push("Usage: version-number parse <version...>");
    out.exitCode = 1;
    return out;
  }

  const json = ctx.config.output.format === "json";

  for (const input of inputs) {
    const result = tryParse(() => ctx.parser.parseVersion(input));
    if (result.ok) {
      const version = result.value;
      out.stdout.push(
        json
          ? JSON.stringify({ input, ok: true, kind: version.kind, version: version.toString() })
          : `${version.kind} ${version.toString()}`,
      );
      continue;
    }

    out.exitCode = 1;
    if (json) {
      out.stdout.push(JSON.stringify({ input, ok: false, ...failureFields(result.error) }));
    } else {
      out.stderr.push(describeFailure(result.error, ctx.config.output.annotate));
    }
  }

  return out;
}

// ---------------------------------------------------------------------------
// check
// ---------------------------------------------------------------------------

export function runCheck(path: string | undefined, ctx: CommandContext): CommandOutput {
  const out: CommandOutput = { stdout: [], stderr: [], exitCode: 0 };
  if (!path) {
    out.stderr.push("Usage: version-number check --file <path>");
    out.exitCode = 1;
    return out;
  }

  const checker = new VersionChecker(ctx.parser, ctx.log);
  const report = checker.checkFile(path);

  if (ctx.config.output.format === "json") {
    const failures = report.entries.flatMap((entry) =>
      entry.result.ok
        ? []
        : [{ line: entry.line, input: entry.input, ...failureFields(entry.result.error) }],
    );
    out.stdout.push(
      JSON.stringify({ file: path, valid: report.valid, invalid: report.invalid, failures }),
    );
  } else {
    for (const entry of report.entries) {
      if (entry.result.ok) continue;
      const { error } = entry.result;
      out.stdout.push(`line ${entry.line}: ${error.message}`);
      const annotation = ctx.config.output.annotate ? error.annotate() : undefined;
      if (annotation !== undefined) {
        for (const line of annotation.split("\n")) {
          out.stdout.push(`  ${line}`);
        }
      }
    }
    out.stdout.push(`${report.valid} valid, ${report.invalid} invalid`);
  }

  out.exitCode = report.invalid > 0 ? 1 : 0;
  return out;
}

// ---------------------------------------------------------------------------
// compare
// ---------------------------------------------------------------------------

function orderSymbol(order: -1 | 0 | 1): string {
  if (order < 0) return "<";
  return order > 0 ? ">" : "=";
}

export function runCompare(
  left: string | undefined,
  right: string | undefined,
  ctx: CommandContext,
): CommandOutput {
  const out: CommandOutput = { stdout: [], stderr: [], exitCode: 0 };
  if (left === undefined || right === undefined) {
    out.stderr.push("Usage: version-number compare <a> <b>");
    out.exitCode = 2;
    return out;
  }

  const a = tryParse(() => ctx.parser.parseVersion(left));
  const b = tryParse(() => ctx.parser.parseVersion(right));
  if (!a.ok || !b.ok) {
    for (const result of [a, b]) {
      if (!result.ok) {
        out.stderr.push(describeFailure(result.error, ctx.config.output.annotate));
      }
    }
    out.exitCode = 2;
    return out;
  }

  const order = compareVersions(a.value, b.value);
  ctx.log.debug({ left, right, order }, "compared versions");

  out.stdout.push(
    ctx.config.output.format === "json"
      ? JSON.stringify({ a: left, b: right, result: order })
      : `${a.value.toString()} ${orderSymbol(order)} ${b.value.toString()}`,
  );
  return out;
}
