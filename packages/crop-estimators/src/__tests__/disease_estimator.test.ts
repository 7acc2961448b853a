import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { ValidationError } from "@bhoomi/contracts";
import type { CropTypeV1 } from "@bhoomi/contracts";
import { DecodeError, DiseaseSeverityEstimatorV1 } from "../index";
import type { DiseaseRequestV1, LeafClassificationV1, LeafClassifier, LeafImageV1 } from "../index";
import { WARN, captureLogger, loadShippedConfig } from "./helpers";

const settings = loadShippedConfig().disease;

const JPEG = Uint8Array.from([0xff, 0xd8, 0xff, 0xe0, 0xff, 0xd9]);

// Classifier stub that records what it was asked and answers with a fixed result.
class FixedClassifier implements LeafClassifier {
  calls: Array<{ format: string; crop: CropTypeV1 }> = [];
  constructor(private readonly answer: LeafClassificationV1) {}
  classify(image: LeafImageV1, cropType: CropTypeV1): LeafClassificationV1 {
    this.calls.push({ format: image.format, crop: cropType });
    return this.answer;
  }
}

class FailingClassifier implements LeafClassifier {
  classify(): LeafClassificationV1 {
    throw new Error("weights not loaded");
  }
}

function estimator(classifier?: LeafClassifier) {
  const cap = captureLogger();
  return { est: new DiseaseSeverityEstimatorV1(settings, { logger: cap.logger, classifier }), records: cap.records };
}

describe("DiseaseSeverityEstimatorV1 without an image", () => {
  it("assumes a healthy crop when nothing is reported", () => {
    const { est } = estimator();
    assert.deepEqual(est.assess({ crop_type: "paddy" }), {
      disease_name: null,
      severity: "none",
      yield_loss_fraction: 0,
      confidence: 0.5,
      method: "fallback"
    });
  });

  it("uses the severity map for a farmer report", () => {
    const { est } = estimator(new FixedClassifier({ label: "blast", confidence: 0.9 }));
    const out = est.assess({ crop_type: "chillies", reported: { severity: "medium", disease_name: "leaf_curl" } });
    assert.deepEqual(out, {
      disease_name: "leaf_curl",
      severity: "medium",
      yield_loss_fraction: 0.15,
      confidence: 0.6,
      method: "fallback"
    });
    assert.ok(Object.isFrozen(out));
  });

  it("rejects an unsupported crop", () => {
    const { est } = estimator();
    const bad: DiseaseRequestV1 = JSON.parse('{"crop_type":"wheat"}');
    assert.throws(
      () => est.assess(bad),
      (err: unknown) => err instanceof ValidationError && err.field === "disease_request.crop_type"
    );
  });
});

describe("DiseaseSeverityEstimatorV1 with a classifier", () => {
  it("looks the label up in the crop's table", () => {
    const clf = new FixedClassifier({ label: "blast", confidence: 0.9 });
    const { est } = estimator(clf);
    assert.deepEqual(est.assess({ crop_type: "paddy", image: JPEG }), {
      disease_name: "blast",
      severity: "high",
      yield_loss_fraction: 0.3,
      confidence: 0.9,
      method: "model"
    });
    assert.deepEqual(clf.calls, [{ format: "jpeg", crop: "paddy" }]);
  });

  it("falls back to the default table", () => {
    const { est } = estimator(new FixedClassifier({ label: "pest_damage", confidence: 0.7 }));
    const out = est.assess({ crop_type: "paddy", image: JPEG });
    assert.equal(out.severity, "medium");
    assert.equal(out.yield_loss_fraction, 0.15);
  });

  it("uses the default table for crops without their own", () => {
    const { est } = estimator(new FixedClassifier({ label: "viral_infection", confidence: 0.8 }));
    const out = est.assess({ crop_type: "okra", image: JPEG });
    assert.equal(out.severity, "high");
    assert.equal(out.yield_loss_fraction, 0.35);
  });

  it("maps a healthy label to no disease", () => {
    const { est } = estimator(new FixedClassifier({ label: "healthy", confidence: 0.95 }));
    assert.deepEqual(est.assess({ crop_type: "tomato", image: JPEG }), {
      disease_name: null,
      severity: "none",
      yield_loss_fraction: 0,
      confidence: 0.95,
      method: "model"
    });
  });

  it("maps an unknown label to the configured outcome and warns", () => {
    const { est, records } = estimator(new FixedClassifier({ label: "mystery_spots", confidence: 0.55 }));
    assert.deepEqual(est.assess({ crop_type: "mango", image: JPEG }), {
      disease_name: "mystery_spots",
      severity: "medium",
      yield_loss_fraction: 0.2,
      confidence: 0.55,
      method: "model"
    });
    const warns = records().filter((r) => r.level === WARN);
    assert.equal(warns.length, 1);
    assert.equal(warns[0]?.msg, "classifier label not in disease tables");
  });

  it("ignores a classifier result with confidence outside [0,1]", () => {
    const { est, records } = estimator(new FixedClassifier({ label: "blast", confidence: 1.5 }));
    const out = est.assess({ crop_type: "paddy", image: JPEG });
    assert.equal(out.method, "fallback");
    assert.equal(out.severity, "low");
    assert.equal(records()[0]?.msg, "leaf classifier returned an invalid result; using fallback");
  });

  it("falls back to the farmer report when the classifier throws", () => {
    const { est, records } = estimator(new FailingClassifier());
    const out = est.assess({ crop_type: "cotton", image: JPEG, reported: { severity: "high" } });
    assert.deepEqual(out, {
      disease_name: null,
      severity: "high",
      yield_loss_fraction: 0.3,
      confidence: 0.6,
      method: "fallback"
    });
    assert.equal(records()[0]?.msg, "leaf classifier failed; using fallback");
  });
});

describe("DiseaseSeverityEstimatorV1 with an image but no classifier", () => {
  it("uses the unclassified-image outcome", () => {
    const { est } = estimator();
    assert.deepEqual(est.assess({ crop_type: "banana", image: JPEG }), {
      disease_name: null,
      severity: "low",
      yield_loss_fraction: 0.05,
      confidence: 0.4,
      method: "fallback"
    });
  });

  it("prefers a farmer report", () => {
    const { est } = estimator();
    const out = est.assess({ crop_type: "banana", image: JPEG, reported: { severity: "low", disease_name: "sigatoka" } });
    assert.equal(out.disease_name, "sigatoka");
    assert.equal(out.yield_loss_fraction, 0.05);
    assert.equal(out.confidence, 0.6);
  });

  it("throws DecodeError for corrupt bytes", () => {
    const { est } = estimator(new FixedClassifier({ label: "blast", confidence: 0.9 }));
    assert.throws(
      () => est.assess({ crop_type: "paddy", image: Uint8Array.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10]) }),
      (err: unknown) => err instanceof DecodeError && err.reason === "missing_end_marker"
    );
  });

  it("treats a null image as missing", () => {
    const { est } = estimator();
    assert.equal(est.assess({ crop_type: "paddy", image: null }).severity, "none");
  });
});
