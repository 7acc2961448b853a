import { AdvisoryConfigV1Z, CROP_TYPES_V1, WEATHER_FIELDS_V1, isCropTypeV1 } from "@bhoomi/contracts"; // structural schema first: closes the shape
import type { AdvisoryConfigV1, DiseaseOutcomeV1 } from "@bhoomi/contracts";
import { ConfigRejectedError } from "./config_rejected_error";
import type { ConfigIssueV1 } from "./config_rejected_error";

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function checkOutcome(outcome: DiseaseOutcomeV1, path: string, out: ConfigIssueV1[]): void {
  if (outcome.severity === "none" && outcome.yield_loss_fraction !== 0) {
    out.push({ path: `${path}.yield_loss_fraction`, message: "severity none must carry a zero yield loss" });
  }
  if (outcome.severity !== "none" && outcome.yield_loss_fraction === 0) {
    out.push({ path: `${path}.yield_loss_fraction`, message: `severity ${outcome.severity} must carry a positive yield loss` });
  }
}

function checkDisease(cfg: AdvisoryConfigV1, out: ConfigIssueV1[]): void {
  const healthy = new Set(cfg.disease.healthy_labels);

  for (const [key, table] of Object.entries(cfg.disease.tables)) {
    if (key !== "default" && !isCropTypeV1(key)) {
      out.push({ path: `disease.tables.${key}`, message: "table key must be a supported crop or \"default\"" });
    }
    for (const [label, outcome] of Object.entries(table)) {
      if (healthy.has(label)) {
        out.push({ path: `disease.tables.${key}.${label}`, message: "healthy labels must not appear in a disease table" });
      }
      checkOutcome(outcome, `disease.tables.${key}.${label}`, out);
    }
  }

  checkOutcome(cfg.disease.unknown_label, "disease.unknown_label", out);
  checkOutcome(cfg.disease.unclassified_image, "disease.unclassified_image", out);
}

function checkYield(cfg: AdvisoryConfigV1, out: ConfigIssueV1[]): void {
  const y = cfg.yield;
  if (y.weather_factor_bounds.min <= 0) {
    out.push({ path: "yield.weather_factor_bounds.min", message: "weather factor lower bound must be positive" });
  }
  for (const field of WEATHER_FIELDS_V1) {
    const r = y.response[field];
    if (r.floor > r.in_band_factor) {
      out.push({ path: `yield.response.${field}.floor`, message: "floor must not exceed in_band_factor" });
    }
  }
  if (y.confidence.degraded > y.confidence.fallback) {
    out.push({ path: "yield.confidence.degraded", message: "degraded confidence must not exceed fallback confidence" });
  }
}

function checkCrops(cfg: AdvisoryConfigV1, out: ConfigIssueV1[]): void {
  const plausible = cfg.yield.plausible;
  for (const crop of CROP_TYPES_V1) {
    const p = cfg.crops[crop];

    if (new Set(p.peak_months).size !== p.peak_months.length) {
      out.push({ path: `crops.${crop}.peak_months`, message: "peak months must be unique" });
    }

    // Climatology is the default for missing readings and must not itself need clamping.
    for (const field of WEATHER_FIELDS_V1) {
      const v = p.climatology[field];
      const range = plausible[field];
      if (v < range.min || v > range.max) {
        out.push({
          path: `crops.${crop}.climatology.${field}`,
          message: `outside plausible range [${range.min}, ${range.max}]`
        });
      }
    }
  }
}

/**
 * Admission validation for config/advisory/default.json.
 * Structural parse, then cross-field checks; every failure is collected before throwing.
 * Returns a deeply frozen document.
 */
export function validateAdvisoryConfigV1(input: unknown): AdvisoryConfigV1 {
  const parsed = AdvisoryConfigV1Z.safeParse(input);
  if (!parsed.success) {
    throw new ConfigRejectedError(
      parsed.error.issues.map((i) => ({ path: i.path.length ? i.path.join(".") : "$", message: i.message }))
    );
  }

  const cfg = parsed.data;
  const errors: ConfigIssueV1[] = [];
  checkDisease(cfg, errors);
  checkYield(cfg, errors);
  checkCrops(cfg, errors);
  if (errors.length) throw new ConfigRejectedError(errors);

  return deepFreeze(cfg);
}

export function isAdvisoryConfigV1(input: unknown): input is AdvisoryConfigV1 {
  try {
    validateAdvisoryConfigV1(input);
    return true;
  } catch {
    return false;
  }
}
