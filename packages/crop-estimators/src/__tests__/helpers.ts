import * as fs from "node:fs";
import * as path from "node:path";
import pino from "pino";
import type { Logger } from "pino";
import { z } from "zod";
import { AdvisoryConfigV1Z } from "@bhoomi/contracts";
import type { AdvisoryConfigV1 } from "@bhoomi/contracts";

export function loadShippedConfig(): AdvisoryConfigV1 {
  const abs = path.resolve(__dirname, "../../../../config/advisory/default.json");
  return AdvisoryConfigV1Z.parse(JSON.parse(fs.readFileSync(abs, "utf8")));
}

export function fixturePath(name: string): string {
  return path.resolve(__dirname, "../../fixtures", name);
}

const LogRecordZ = z.object({ level: z.number(), msg: z.string() }).passthrough();
export type LogRecord = z.infer<typeof LogRecordZ>;

// In-memory pino destination; records are parsed back from the JSON lines.
export function captureLogger(): { logger: Logger; records: () => LogRecord[] } {
  const lines: string[] = [];
  const logger = pino({ level: "debug" }, { write: (msg: string) => void lines.push(msg) });
  return { logger, records: () => lines.map((l) => LogRecordZ.parse(JSON.parse(l))) };
}

export const WARN = 40;

export function near(actual: number, expected: number, eps = 1e-9): boolean {
  return Math.abs(actual - expected) <= eps;
}
