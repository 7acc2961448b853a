import type { Logger } from "pino";
import { z } from "zod";
import { CropTypeV1Z, ReportedSeverityV1Z, parseWithSchema } from "@bhoomi/contracts";
import type { CropTypeV1, DiseaseAssessmentV1, DiseaseOutcomeV1, DiseaseSettingsV1, DiseaseTableV1 } from "@bhoomi/contracts";
import { LeafClassificationV1Z } from "./leaf_classifier";
import type { LeafClassificationV1, LeafClassifier } from "./leaf_classifier";
import { decodeLeafImageV1 } from "./leaf_image";
import type { LeafImageV1 } from "./leaf_image";

export const ReportedDiseaseV1Z = z
  .object({
    severity: ReportedSeverityV1Z,
    disease_name: z.string().min(1).nullable().optional()
  })
  .strict();

export type ReportedDiseaseV1 = z.infer<typeof ReportedDiseaseV1Z>;

export const DiseaseRequestV1Z = z
  .object({
    crop_type: CropTypeV1Z,
    image: z.instanceof(Uint8Array).nullable().optional(),
    reported: ReportedDiseaseV1Z.nullable().optional()
  })
  .strict();

export type DiseaseRequestV1 = z.infer<typeof DiseaseRequestV1Z>;

export type DiseaseEstimatorOptionsV1 = {
  logger: Logger;
  classifier?: LeafClassifier;
};

function lookup(table: DiseaseTableV1 | undefined, label: string): DiseaseOutcomeV1 | undefined {
  return table && Object.hasOwn(table, label) ? table[label] : undefined;
}

/**
 * Disease severity from a leaf photo, a farmer report, or neither.
 *
 * Order of evidence: classifier on a decodable image, then the farmer's report,
 * then the configured outcome for an image nobody could classify. Without an
 * image or a report the crop is assumed healthy.
 *
 * A corrupt image throws DecodeError; a missing one never throws.
 */
export class DiseaseSeverityEstimatorV1 {
  private readonly settings: DiseaseSettingsV1;
  private readonly logger: Logger;
  private readonly classifier: LeafClassifier | undefined;

  constructor(settings: DiseaseSettingsV1, opts: DiseaseEstimatorOptionsV1) {
    this.settings = settings;
    this.logger = opts.logger;
    this.classifier = opts.classifier;
  }

  assess(input: DiseaseRequestV1): DiseaseAssessmentV1 {
    const req = parseWithSchema(DiseaseRequestV1Z, input, "disease_request");
    const reported = req.reported ?? null;

    if (req.image == null) {
      return reported ? this.fromReport(reported) : this.noDisease(this.settings.confidence.no_image, "fallback");
    }

    const image = decodeLeafImageV1(req.image);
    const classification = this.classify(image, req.crop_type);
    if (classification) return this.fromClassification(classification, req.crop_type);

    if (reported) return this.fromReport(reported);
    return Object.freeze({
      disease_name: null,
      severity: this.settings.unclassified_image.severity,
      yield_loss_fraction: this.settings.unclassified_image.yield_loss_fraction,
      confidence: this.settings.confidence.unclassified_image,
      method: "fallback"
    });
  }

  private classify(image: LeafImageV1, cropType: CropTypeV1): LeafClassificationV1 | null {
    if (!this.classifier) return null;
    try {
      const raw = this.classifier.classify(image, cropType);
      const parsed = LeafClassificationV1Z.safeParse(raw);
      if (parsed.success) return parsed.data;
      this.logger.warn(
        { crop_type: cropType, issue: parsed.error.issues[0]?.message },
        "leaf classifier returned an invalid result; using fallback"
      );
    } catch (err) {
      this.logger.warn({ crop_type: cropType, err }, "leaf classifier failed; using fallback");
    }
    return null;
  }

  private fromClassification(c: LeafClassificationV1, cropType: CropTypeV1): DiseaseAssessmentV1 {
    if (this.settings.healthy_labels.includes(c.label)) return this.noDisease(c.confidence, "model");

    const tables = this.settings.tables;
    const outcome = lookup(tables[cropType], c.label) ?? lookup(tables.default, c.label);
    if (!outcome) {
      this.logger.warn({ crop_type: cropType, label: c.label }, "classifier label not in disease tables");
    }
    const o = outcome ?? this.settings.unknown_label;

    return Object.freeze({
      disease_name: o.severity === "none" ? null : c.label,
      severity: o.severity,
      yield_loss_fraction: o.yield_loss_fraction,
      confidence: c.confidence,
      method: "model"
    });
  }

  private fromReport(r: ReportedDiseaseV1): DiseaseAssessmentV1 {
    return Object.freeze({
      disease_name: r.disease_name ?? null,
      severity: r.severity,
      yield_loss_fraction: this.settings.severity_loss_fraction[r.severity],
      confidence: this.settings.confidence.reported,
      method: "fallback"
    });
  }

  private noDisease(confidence: number, method: DiseaseAssessmentV1["method"]): DiseaseAssessmentV1 {
    return Object.freeze({ disease_name: null, severity: "none", yield_loss_fraction: 0, confidence, method });
  }
}
