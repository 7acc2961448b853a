import * as path from "node:path";
import pino from "pino";
import type { Logger } from "pino";
import { z } from "zod";

export const SHIPPED_CONFIG_PATH = path.resolve(__dirname, "../../../../config/advisory/default.json");

export function fixturePath(name: string): string {
  return path.resolve(__dirname, "../../fixtures", name);
}

const LogRecordZ = z.object({ level: z.number(), msg: z.string() }).passthrough();
export type LogRecord = z.infer<typeof LogRecordZ>;

export function captureLogger(): { logger: Logger; records: () => LogRecord[] } {
  const lines: string[] = [];
  const logger = pino({ level: "debug" }, { write: (msg: string) => void lines.push(msg) });
  return { logger, records: () => lines.map((l) => LogRecordZ.parse(JSON.parse(l))) };
}

export const INFO = 30;
export const WARN = 40;
