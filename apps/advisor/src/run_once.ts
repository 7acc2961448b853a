import fs from "node:fs";
import path from "node:path";
import process from "node:process";

import type { Logger } from "pino";
import { loadLinearModelV1 } from "@bhoomi/crop-estimators";
import { loadAdvisoryConfigFileV1, loadAdvisoryConfigV1 } from "./config/ssot";
import { createLogger } from "./logger";
import { AdvisoryPipelineV1 } from "./pipeline";
import type { AdvisoryReportV1 } from "./pipeline";

export type RunArgs = {
  submission: string; // path to a submission JSON file
  config?: string; // advisory config; defaults to the SSOT lookup
  yieldModel?: string; // linear_model_v1 predicting yield_per_acre
  priceModel?: string; // linear_model_v1 predicting price_uplift_fraction
};

export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): RunArgs {
  const get = (k: string): string | undefined => {
    const idx = argv.indexOf(`--${k}`);
    if (idx === -1) return undefined;
    const v = argv[idx + 1];
    if (!v || v.startsWith("--")) return undefined;
    return v;
  };

  const submission = get("submission") ?? env.ADVISOR_SUBMISSION;
  if (!submission) throw new Error("missing submission (set --submission or ADVISOR_SUBMISSION)");

  return {
    submission,
    config: get("config"),
    yieldModel: get("yield-model"),
    priceModel: get("price-model")
  };
}

export function runOnce(args: RunArgs, logger: Logger): AdvisoryReportV1 {
  const loaded = args.config ? loadAdvisoryConfigFileV1(args.config) : loadAdvisoryConfigV1();
  const pipeline = new AdvisoryPipelineV1(loaded, {
    logger,
    yieldModel: args.yieldModel ? loadLinearModelV1(args.yieldModel, "yield_per_acre") : undefined,
    priceModel: args.priceModel ? loadLinearModelV1(args.priceModel, "price_uplift_fraction") : undefined
  });

  const submission: unknown = JSON.parse(fs.readFileSync(path.resolve(args.submission), "utf8"));
  return pipeline.run(submission);
}

async function main(logger: Logger): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  logger.info({ submission: args.submission, config: args.config ?? null }, "advisor run_once");
  const report = runOnce(args, logger);
  process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
}

if (require.main === module) {
  const logger = createLogger();
  main(logger).catch((err: unknown) => {
    logger.error({ err }, "advisor run_once failed");
    process.exit(1);
  });
}
