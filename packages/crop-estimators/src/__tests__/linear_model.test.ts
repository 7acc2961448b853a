import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { ModelLoadError, loadLinearModelV1, parseLinearModelV1 } from "../index";
import { fixturePath } from "./helpers";

function expectLoadError(fn: () => unknown, contains: string): void {
  assert.throws(fn, (err: unknown) => {
    assert.ok(err instanceof ModelLoadError, `expected ModelLoadError, got ${String(err)}`);
    assert.ok(err.message.includes(contains), `expected "${contains}" in "${err.message}"`);
    return true;
  });
}

describe("LinearModelV1", () => {
  it("predicts intercept plus weighted features", () => {
    const m = parseLinearModelV1({
      type: "linear_model_v1",
      schema_version: "1.0.0",
      model_id: "m1",
      target: "yield_per_acre",
      intercept: 2,
      coefficients: { a: 3, b: -1 }
    });
    assert.equal(m.predict({ a: 4, b: 5, unused: 100 }), 9);
    assert.deepEqual(m.features(), ["a", "b"]);
  });

  it("throws on a missing feature", () => {
    const m = loadLinearModelV1(fixturePath("yield_model_paddy.json"), "yield_per_acre");
    assert.throws(() => m.predict({ rainfall_mm: 100 }), /MODEL_FEATURE_MISSING: paddy-yield-demo: temperature_c/);
  });
});

describe("loadLinearModelV1", () => {
  it("loads a model document from disk", () => {
    const m = loadLinearModelV1(fixturePath("price_model_demo.json"), "price_uplift_fraction");
    assert.equal(m.model_id, "seasonal-uplift-demo");
    assert.equal(m.target, "price_uplift_fraction");
  });

  it("rejects a model trained for another target", () => {
    expectLoadError(
      () => loadLinearModelV1(fixturePath("price_model_demo.json"), "yield_per_acre"),
      "target price_uplift_fraction where yield_per_acre is required"
    );
  });

  it("rejects a document without coefficients", () => {
    expectLoadError(() => loadLinearModelV1(fixturePath("model_bad_001.json"), "yield_per_acre"), "coefficients");
  });

  it("rejects a missing file", () => {
    expectLoadError(() => loadLinearModelV1(fixturePath("no_such_model.json"), "yield_per_acre"), "no_such_model.json");
  });

  it("rejects an unknown document type", () => {
    expectLoadError(() => parseLinearModelV1({ type: "tree_model_v1" }, "inline-test"), "MODEL_LOAD_FAILED: inline-test: type");
  });
});
