import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

const ParserKindSchema = z.enum(["incremental", "one-shot"]);
const OutputFormatSchema = z.enum(["text", "json"]);
const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const ConfigSchema = z.object({
  parser: ParserKindSchema.default("incremental"),
  output: z
    .object({
      format: OutputFormatSchema.default("text"),
      annotate: z.boolean().default(true),
    })
    .default({}),
  logging: z
    .object({
      level: LogLevelSchema.default("warn"),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export interface ConfigOverrides {
  parser?: string;
  format?: string;
  annotate?: boolean;
  logLevel?: string;
}

function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return { ...value };
  }
  return {};
}

function applyOverrides(raw: Record<string, unknown>, overrides: ConfigOverrides): void {
  if (overrides.parser !== undefined) {
    raw["parser"] = overrides.parser;
  }
  if (overrides.format !== undefined || overrides.annotate !== undefined) {
    const output = asRecord(raw["output"]);
    if (overrides.format !== undefined) output["format"] = overrides.format;
    if (overrides.annotate !== undefined) output["annotate"] = overrides.annotate;
    raw["output"] = output;
  }
  if (overrides.logLevel !== undefined) {
    raw["logging"] = { ...asRecord(raw["logging"]), level: overrides.logLevel };
  }
}

export function applyEnvOverrides(raw: Record<string, unknown>): void {
  applyOverrides(raw, {
    parser: process.env["VERSION_NUMBER_PARSER"] || undefined,
    format: process.env["VERSION_NUMBER_FORMAT"] || undefined,
    logLevel: process.env["VERSION_NUMBER_LOG_LEVEL"] || process.env["LOG_LEVEL"] || undefined,
  });
}

/**
 * Load configuration: file (if any), then environment, then explicit
 * overrides (CLI flags), validated against the schema.
 */
export function loadConfig(configPath?: string, overrides: ConfigOverrides = {}): Config {
  const path = configPath ?? resolveConfigPath();

  let raw: Record<string, unknown> = {};
  if (path && existsSync(path)) {
    const content = readFileSync(path, "utf-8");
    raw = asRecord(parseYaml(content));
  }

  applyEnvOverrides(raw);
  applyOverrides(raw, overrides);

  return ConfigSchema.parse(raw);
}

function resolveConfigPath(): string | undefined {
  const candidates = [
    process.env["VERSION_NUMBER_CONFIG"],
    resolve(process.cwd(), "version-number.yaml"),
  ];
  for (const c of candidates) {
    if (c && existsSync(c)) return c;
  }
  return undefined;
}
