import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import { z } from "zod";
import { parseWithSchema } from "@bhoomi/contracts";

const LogLevelZ = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

/**
 * Structured JSON logger. Level from LOG_LEVEL (default info).
 * Writes to stderr unless a destination is given; stdout carries the report.
 */
export function createLogger(env: NodeJS.ProcessEnv = process.env, destination?: DestinationStream): Logger {
  const level = parseWithSchema(LogLevelZ, env.LOG_LEVEL ?? "info", "LOG_LEVEL");
  return pino({ name: "advisor", level }, destination ?? pino.destination(2));
}
