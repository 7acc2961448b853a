import * as fs from "node:fs";
import { z } from "zod";
import { SemVerZ } from "@bhoomi/contracts";

export type FeatureVectorV1 = Readonly<Record<string, number>>;

/** Port for a fitted regressor. Throws when a feature it needs is absent. */
export interface RegressionModel {
  readonly model_id: string;
  predict(features: FeatureVectorV1): number;
}

export const ModelTargetV1Z = z.enum(["yield_per_acre", "price_uplift_fraction"]);
export type ModelTargetV1 = z.infer<typeof ModelTargetV1Z>;

export const LinearModelDocV1Z = z
  .object({
    type: z.literal("linear_model_v1"),
    schema_version: SemVerZ,
    model_id: z.string().min(1),
    target: ModelTargetV1Z,
    intercept: z.number().finite(),
    coefficients: z.record(z.string().min(1), z.number().finite()).refine((c) => Object.keys(c).length > 0, {
      message: "at least one coefficient required"
    })
  })
  .strict();

export type LinearModelDocV1 = z.infer<typeof LinearModelDocV1Z>;

export class ModelLoadError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(`MODEL_LOAD_FAILED: ${source}: ${message}`);
    this.name = "ModelLoadError";
    this.source = source;
  }
}

/** y = intercept + sum(coefficient_i * x_i). */
export class LinearModelV1 implements RegressionModel {
  readonly model_id: string;
  readonly target: ModelTargetV1;
  private readonly intercept: number;
  private readonly coefficients: ReadonlyArray<readonly [string, number]>;

  constructor(doc: LinearModelDocV1) {
    this.model_id = doc.model_id;
    this.target = doc.target;
    this.intercept = doc.intercept;
    this.coefficients = Object.freeze(Object.entries(doc.coefficients).map(([k, v]) => [k, v] as const));
  }

  features(): string[] {
    return this.coefficients.map(([k]) => k);
  }

  predict(features: FeatureVectorV1): number {
    let y = this.intercept;
    for (const [name, w] of this.coefficients) {
      const x = features[name];
      if (x === undefined || !Number.isFinite(x)) throw new Error(`MODEL_FEATURE_MISSING: ${this.model_id}: ${name}`);
      y += w * x;
    }
    return y;
  }
}

export function parseLinearModelV1(input: unknown, source = "<inline>"): LinearModelV1 {
  const parsed = LinearModelDocV1Z.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? issue.path.join(".") : "$";
    throw new ModelLoadError(source, `${where}: ${issue?.message ?? "invalid model document"}`);
  }
  return new LinearModelV1(parsed.data);
}

/** Reads a linear_model_v1 JSON file whose target must equal `expectedTarget`. */
export function loadLinearModelV1(filePath: string, expectedTarget: ModelTargetV1): LinearModelV1 {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new ModelLoadError(filePath, err instanceof Error ? err.message : String(err));
  }

  const model = parseLinearModelV1(raw, filePath);
  if (model.target !== expectedTarget) {
    throw new ModelLoadError(filePath, `target ${model.target} where ${expectedTarget} is required`);
  }
  return model;
}
