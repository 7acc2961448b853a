export { ConfigRejectedError } from "./config/config_rejected_error";
export type { ConfigIssueV1 } from "./config/config_rejected_error";
export { validateAdvisoryConfigV1, isAdvisoryConfigV1 } from "./config/advisory_config_v1_validator";
