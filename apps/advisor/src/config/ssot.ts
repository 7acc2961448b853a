// apps/advisor/src/config/ssot.ts
//
// Advisory config SSOT loader.
//
// Contract:
// - SSOT file: config/advisory/default.json (ADVISOR_CONFIG_PATH overrides it)
// - every document passes admission validation before use
// - config_hash: sha256(stableStringify(parsedJson)) with "sha256:" prefix

import fs from "node:fs";
import path from "node:path";

import { ConfigRejectedError, validateAdvisoryConfigV1 } from "@bhoomi/config-validator";
import type { AdvisoryConfigV1 } from "@bhoomi/contracts";
import { findRepoRoot, sha256Hex, stableStringify } from "../util";

export const SSOT_RELATIVE_PATH = path.join("config", "advisory", "default.json");

export type LoadedAdvisoryConfigV1 = {
  config: AdvisoryConfigV1;
  config_hash: string;
  source: string; // absolute path of the admitted document
};

export type SsotLookupV1 = {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

function resolveRepoRoot(env: NodeJS.ProcessEnv, cwd: string): string {
  // 1) explicit override
  if (env.ADVISOR_REPO_ROOT) return path.resolve(cwd, env.ADVISOR_REPO_ROOT);

  // 2) walk upward from cwd until the SSOT file shows up
  return findRepoRoot(cwd, SSOT_RELATIVE_PATH);
}

export function resolveConfigPath(lookup: SsotLookupV1 = {}): string {
  const env = lookup.env ?? process.env;
  const cwd = lookup.cwd ?? process.cwd();
  if (env.ADVISOR_CONFIG_PATH) return path.resolve(cwd, env.ADVISOR_CONFIG_PATH);
  return path.join(resolveRepoRoot(env, cwd), SSOT_RELATIVE_PATH);
}

export function computeConfigHash(doc: unknown): string {
  return `sha256:${sha256Hex(stableStringify(doc))}`;
}

export function loadAdvisoryConfigFileV1(filePath: string): LoadedAdvisoryConfigV1 {
  const source = path.resolve(filePath);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(source, "utf8"));
  } catch (err) {
    throw new ConfigRejectedError([{ path: "$", message: `${source}: ${err instanceof Error ? err.message : String(err)}` }]);
  }

  const config = validateAdvisoryConfigV1(raw);
  return Object.freeze({ config, config_hash: computeConfigHash(raw), source });
}

export function loadAdvisoryConfigV1(lookup: SsotLookupV1 = {}): LoadedAdvisoryConfigV1 {
  return loadAdvisoryConfigFileV1(resolveConfigPath(lookup));
}
