#!/usr/bin/env node

import { parseArgs } from "node:util";
import { loadConfig, type Config } from "./config.js";
import { createLogger } from "./logger.js";
import { getParser } from "./parser/parsers.js";
import { runCheck, runCompare, runParse, type CommandOutput } from "./commands.js";

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    // Global options
    config: { type: "string", short: "c" },
    parser: { type: "string" },
    format: { type: "string" },
    json: { type: "boolean" },
    "no-annotate": { type: "boolean" },
    help: { type: "boolean", short: "h" },
    version: { type: "boolean", short: "v" },
    // Check flags
    file: { type: "string", short: "f" },
  },
});

const command = positionals[0];

if (values.version) {
  const { VERSION } = await import("./version.js");
  console.log(`version-number ${VERSION}`);
  process.exit(0);
}

if (values.help || command === undefined) {
  console.log(`version-number - strict MAJOR.MINOR[.PATCH] version parser

Usage:
  version-number parse <version...>     Parse versions and print their shape
  version-number check --file <path>    Check one version per line of a file
  version-number compare <a> <b>        Print <, = or > for two versions

Options:
  -c, --config <path>           Config file path
  --parser <kind>               incremental (default) or one-shot
  --format <text|json>          Output format
  --json                        Same as --format json
  --no-annotate                 Omit the caret line under rejected input
  -f, --file <path>             File to check (with check)

General:
  -h, --help                    Show help
  -v, --version                 Show version
`);
  process.exit(values.help ? 0 : 1);
}

if (command !== "parse" && command !== "check" && command !== "compare") {
  console.error(`Unknown command: ${command}`);
  process.exit(1);
}

let config: Config;
try {
  config = loadConfig(values.config, {
    parser: values.parser,
    format: values.json ? "json" : values.format,
    annotate: values["no-annotate"] ? false : undefined,
  });
} catch (err) {
  // No logger before the config is known
  console.error(`Invalid configuration: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
const log = createLogger(config);
const ctx = { config, parser: getParser(config.parser), log };

function dispatch(name: "parse" | "check" | "compare"): CommandOutput {
  switch (name) {
    case "parse":
      return runParse(positionals.slice(1), ctx);
    case "check":
      return runCheck(values.file ?? positionals[1], ctx);
    case "compare":
      return runCompare(positionals[1], positionals[2], ctx);
  }
}

let output: CommandOutput;
try {
  output = dispatch(command);
} catch (err) {
  log.fatal({ err }, "command failed");
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
}

for (const line of output.stdout) console.log(line);
for (const line of output.stderr) console.error(line);
process.exit(output.exitCode);
