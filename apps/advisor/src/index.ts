export { AdvisoryPipelineV1 } from "./pipeline";
export type { AdvisoryPipelineOptionsV1, AdvisoryReportV1 } from "./pipeline";
export { PriceObservationV1Z, SubmissionV1Z, parseSubmissionV1, resolveCurrentPrice } from "./submission";
export type { PriceObservationV1, SubmissionV1 } from "./submission";
export { computeStorageEconomicsV1, yieldReductionPct } from "./storage_economics";
export type { StorageEconomicsV1 } from "./storage_economics";
export { explainAdvisoryV1 } from "./explanation";
export type { ExplanationFactsV1 } from "./explanation";
export { SSOT_RELATIVE_PATH, computeConfigHash, loadAdvisoryConfigFileV1, loadAdvisoryConfigV1, resolveConfigPath } from "./config/ssot";
export type { LoadedAdvisoryConfigV1, SsotLookupV1 } from "./config/ssot";
export { createLogger } from "./logger";
