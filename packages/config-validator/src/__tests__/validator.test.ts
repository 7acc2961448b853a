import assert from "node:assert/strict";
import * as fs from "node:fs";
import * as path from "node:path";
import { describe, it } from "node:test";

import type { AdvisoryConfigV1 } from "@bhoomi/contracts";
import { ConfigRejectedError, isAdvisoryConfigV1, validateAdvisoryConfigV1 } from "../index";

function readJson(relPathFromTestDir: string): unknown {
  const abs = path.resolve(__dirname, relPathFromTestDir); // anchored on __dirname so cwd does not matter
  return JSON.parse(fs.readFileSync(abs, "utf8"));
}

const shipped = readJson("../../../../config/advisory/default.json");

// Fresh mutable copy of the shipped document for negative cases.
function shippedCopy(): AdvisoryConfigV1 {
  return structuredClone(validateAdvisoryConfigV1(shipped));
}

function rejectionPaths(input: unknown): string[] {
  try {
    validateAdvisoryConfigV1(input);
  } catch (err) {
    assert.ok(err instanceof ConfigRejectedError, `expected ConfigRejectedError, got ${String(err)}`);
    assert.ok(err.message.startsWith("CONFIG_REJECTED: "));
    return err.errors.map((e) => e.path);
  }
  throw new Error("expected rejection but config was admitted");
}

describe("validateAdvisoryConfigV1", () => {
  it("admits the shipped configuration and freezes it", () => {
    const cfg = validateAdvisoryConfigV1(shipped);
    assert.equal(cfg.policy.min_gain_pct, 5);
    assert.equal(cfg.crops.paddy.yield_per_acre, 25);
    assert.ok(Object.isFrozen(cfg));
    assert.ok(Object.isFrozen(cfg.crops.mango.peak_months));
    assert.ok(Object.isFrozen(cfg.disease.tables.default));
    assert.equal(isAdvisoryConfigV1(shipped), true);
  });

  it("reports every structural issue of a malformed document", () => {
    const paths = rejectionPaths(readJson("../../fixtures/config_bad_shape_001.json"));
    assert.equal(paths[0], "type");
    assert.equal(paths[1], "schema_version");
    assert.ok(paths.includes("policy"));
    assert.ok(paths.includes("storage"));
    assert.ok(paths.includes("crops"));
  });

  it("rejects disease tables for unsupported crops", () => {
    const cfg = shippedCopy();
    cfg.disease.tables["wheat"] = { rust: { severity: "high", yield_loss_fraction: 0.3 } };
    assert.deepEqual(rejectionPaths(cfg), ["disease.tables.wheat"]);
  });

  it("rejects healthy labels inside a table and zero-loss diseases", () => {
    const cfg = shippedCopy();
    cfg.disease.tables["paddy"] = {
      healthy: { severity: "none", yield_loss_fraction: 0 },
      blast: { severity: "high", yield_loss_fraction: 0 }
    };
    assert.deepEqual(rejectionPaths(cfg), ["disease.tables.paddy.healthy", "disease.tables.paddy.blast.yield_loss_fraction"]);
  });

  it("rejects a floor above the in-band factor and a zero factor bound", () => {
    const cfg = shippedCopy();
    cfg.yield.response.humidity_pct.floor = 1.2;
    cfg.yield.weather_factor_bounds.min = 0;
    assert.deepEqual(rejectionPaths(cfg), ["yield.weather_factor_bounds.min", "yield.response.humidity_pct.floor"]);
  });

  it("rejects duplicate peak months and implausible climatology", () => {
    const cfg = shippedCopy();
    cfg.crops.tomato.peak_months = [4, 4];
    cfg.crops.banana.climatology.humidity_pct = 100;
    cfg.crops.banana.climatology.rainfall_mm = 1600;
    assert.deepEqual(rejectionPaths(cfg), ["crops.banana.climatology.rainfall_mm", "crops.tomato.peak_months"]);
    assert.equal(isAdvisoryConfigV1(cfg), false);
  });
});
