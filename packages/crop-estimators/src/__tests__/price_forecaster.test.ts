import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { ValidationError } from "@bhoomi/contracts";
import { PriceForecasterV1, loadLinearModelV1, monthsToPeak } from "../index";
import type { FeatureVectorV1, RegressionModel } from "../index";
import { captureLogger, fixturePath, loadShippedConfig } from "./helpers";

const cfg = loadShippedConfig();

class StubModel implements RegressionModel {
  readonly model_id = "stub";
  seen: FeatureVectorV1[] = [];
  constructor(private readonly answer: () => number) {}
  predict(features: FeatureVectorV1): number {
    this.seen.push(features);
    return this.answer();
  }
}

function forecaster(model?: RegressionModel) {
  const cap = captureLogger();
  return { fc: new PriceForecasterV1(cfg.price, cfg.crops, { logger: cap.logger, model }), records: cap.records };
}

describe("monthsToPeak", () => {
  it("takes the shortest forward distance and wraps the year", () => {
    assert.equal(monthsToPeak(8, [11, 12, 1]), 3);
    assert.equal(monthsToPeak(12, [11, 12, 1]), 0);
    assert.equal(monthsToPeak(2, [11, 12, 1]), 9);
    assert.equal(monthsToPeak(12, [3, 4]), 3);
  });
});

describe("PriceForecasterV1 seasonal formula", () => {
  it("discounts the uplift by the months to peak", () => {
    const { fc } = forecaster();
    // paddy: uplift 0.2 * (1 - 0.04 * 3) = 0.176
    assert.deepEqual(fc.forecast({ crop_type: "paddy", current_price: 2000, evaluation_date: "2024-08-15" }), {
      current_price: 2000,
      predicted_peak_price: 2352,
      peak_date: "2024-11-01",
      evaluation_date: "2024-08-15",
      confidence: 0.6,
      method: "fallback",
      months_to_peak: 3,
      market_data: "observed"
    });
  });

  it("returns the current price when the evaluation month is a peak month", () => {
    const { fc } = forecaster();
    const f = fc.forecast({ crop_type: "paddy", current_price: 2000, evaluation_date: "2024-12-10" });
    assert.equal(f.months_to_peak, 0);
    assert.equal(f.predicted_peak_price, 2000);
    assert.equal(f.peak_date, "2024-12-10");
  });

  it("rolls the peak date into the next year", () => {
    const { fc } = forecaster();
    const f = fc.forecast({ crop_type: "mango", current_price: 3000, evaluation_date: "2024-12-15" });
    assert.equal(f.peak_date, "2025-03-01");
    assert.equal(f.predicted_peak_price, 3792); // 3000 * (1 + 0.3 * 0.88)
  });

  it("applies a deeper discount far from the peak", () => {
    const { fc } = forecaster();
    const f = fc.forecast({ crop_type: "paddy", current_price: 2000, evaluation_date: "2025-02-01" });
    assert.equal(f.months_to_peak, 9);
    assert.equal(f.peak_date, "2025-11-01");
    assert.equal(f.predicted_peak_price, 2256); // uplift 0.2 * 0.64
  });

  it("is deterministic and returns frozen output", () => {
    const { fc } = forecaster();
    const req = { crop_type: "okra" as const, current_price: 2100, evaluation_date: "2024-06-30" };
    const a = fc.forecast(req);
    assert.deepEqual(fc.forecast(req), a);
    assert.ok(Object.isFrozen(a));
  });
});

describe("PriceForecasterV1 market signals", () => {
  it("leaves the forecast unchanged for normal supply and demand", () => {
    const { fc } = forecaster();
    const base = fc.forecast({ crop_type: "paddy", current_price: 2000, evaluation_date: "2024-08-15" });
    const normal = fc.forecast({
      crop_type: "paddy",
      current_price: 2000,
      evaluation_date: "2024-08-15",
      market_signals: { supply: "normal", demand: "normal" }
    });
    assert.deepEqual(normal, base);
  });

  it("caps the combined factor at the maximum uplift", () => {
    const { fc } = forecaster();
    const f = fc.forecast({
      crop_type: "paddy",
      current_price: 2000,
      evaluation_date: "2024-08-15",
      market_signals: { supply: "low", demand: "high" }
    });
    assert.equal(f.predicted_peak_price, 3000);
  });

  it("can forecast a lower peak under glut conditions", () => {
    const { fc } = forecaster();
    const f = fc.forecast({
      crop_type: "paddy",
      current_price: 2000,
      evaluation_date: "2024-08-15",
      market_signals: { supply: "high", demand: "low" }
    });
    assert.equal(f.predicted_peak_price, 1799.28); // 2000 * 1.176 * 0.85 * 0.9
  });
});

describe("PriceForecasterV1 without market data", () => {
  for (const current_price of [null, 0, -5, Number.NaN, Number.POSITIVE_INFINITY]) {
    it(`uses the reference price for ${String(current_price)}`, () => {
      const { fc, records } = forecaster(new StubModel(() => 0.4));
      const f = fc.forecast({ crop_type: "paddy", current_price, evaluation_date: "2024-08-15" });
      assert.equal(f.current_price, 2200);
      assert.equal(f.predicted_peak_price, 2587.2);
      assert.equal(f.market_data, "reference");
      assert.equal(f.method, "fallback");
      assert.equal(f.confidence, 0.3);
      assert.equal(records()[0]?.msg, "no usable market price; using reference price");
    });
  }

  it("uses the reference price when the field is absent", () => {
    const { fc } = forecaster();
    assert.equal(fc.forecast({ crop_type: "sugarcane", evaluation_date: "2024-11-05" }).current_price, 350);
  });
});

describe("PriceForecasterV1 model path", () => {
  it("uses the predicted uplift", () => {
    const model = new StubModel(() => 0.25);
    const { fc } = forecaster(model);
    const f = fc.forecast({ crop_type: "paddy", current_price: 2000, evaluation_date: "2024-08-15" });
    assert.equal(f.predicted_peak_price, 2500);
    assert.equal(f.method, "model");
    assert.equal(f.confidence, 0.85);
    assert.deepEqual(model.seen, [{ current_price: 2000, months_to_peak: 3, evaluation_month: 8 }]);
  });

  it("clamps the predicted uplift to [0, max]", () => {
    assert.equal(
      forecaster(new StubModel(() => 0.9)).fc.forecast({ crop_type: "paddy", current_price: 2000, evaluation_date: "2024-08-15" })
        .predicted_peak_price,
      3000
    );
    assert.equal(
      forecaster(new StubModel(() => -0.2)).fc.forecast({ crop_type: "paddy", current_price: 2000, evaluation_date: "2024-08-15" })
        .predicted_peak_price,
      2000
    );
  });

  it("skips the model inside the peak window", () => {
    const model = new StubModel(() => 0.25);
    const f = forecaster(model).fc.forecast({ crop_type: "paddy", current_price: 2000, evaluation_date: "2024-11-15" });
    assert.equal(f.method, "fallback");
    assert.equal(model.seen.length, 0);
  });

  it("falls back to the formula when the model throws", () => {
    const { fc, records } = forecaster(
      new StubModel(() => {
        throw new Error("boom");
      })
    );
    const f = fc.forecast({ crop_type: "paddy", current_price: 2000, evaluation_date: "2024-08-15" });
    assert.equal(f.method, "fallback");
    assert.equal(f.predicted_peak_price, 2352);
    assert.equal(records()[0]?.msg, "price model failed; using seasonal formula");
  });

  it("runs a model loaded from disk", () => {
    const model = loadLinearModelV1(fixturePath("price_model_demo.json"), "price_uplift_fraction");
    const f = forecaster(model).fc.forecast({ crop_type: "paddy", current_price: 2000, evaluation_date: "2024-08-15" });
    assert.equal(f.predicted_peak_price, 2320); // uplift 0.1 + 0.02 * 3
  });
});

describe("PriceForecasterV1 validation", () => {
  it("rejects a malformed evaluation date", () => {
    const { fc } = forecaster();
    assert.throws(
      () => fc.forecast({ crop_type: "paddy", current_price: 2000, evaluation_date: "2024-02-30" }),
      (err: unknown) => err instanceof ValidationError && err.field === "price_request.evaluation_date"
    );
  });
});
