import pino from "pino";
import type { Config } from "./config.js";

/** Root logger for the CLI. Writes to stderr so stdout stays parseable. */
export function createLogger(config: Config): pino.Logger {
  return pino(
    { level: config.logging.level },
    pino.destination(2),
  );
}
