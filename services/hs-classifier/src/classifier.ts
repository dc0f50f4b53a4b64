import { applyConsistencyRules } from "./consistency.js";
import { logger } from "./logger.js";
import type { ParseOutcome } from "./parser.js";
import type { ReferenceTable } from "./reference.js";
import { modelClassificationSchema, modelPayloadSchema, type ModelClassification, type ModelVisualAnalysis } from "./schema.js";
import type {
  ClassificationCandidate,
  ClassificationResult,
  LabelTextExtraction,
  VisualAnalysis,
} from "./types.js";

export const MAX_CANDIDATES = 3;
export const UNCLASSIFIED_CODE = "UNCLASSIFIED";

function emptyLabelText(): LabelTextExtraction {
  return { visibleText: [], certificationMarks: [], regulatoryMarks: [], qualifierKeywords: [] };
}

/**
 * Fractions in [0, 1] are scaled to percentages; anything larger is taken as a
 * percentage already. Output is clamped to [0, 100] with one decimal.
 */
export function normalizeConfidence(value: unknown): number {
  const numeric = typeof value === "string" ? Number.parseFloat(value.replace("%", "")) : value;
  if (typeof numeric !== "number" || !Number.isFinite(numeric)) {
    return 0;
  }
  const percent = numeric <= 1 ? numeric * 100 : numeric;
  const clamped = Math.min(100, Math.max(0, percent));
  return Math.round(clamped * 10) / 10;
}

export function placeholderCandidate(reasoning: string): ClassificationCandidate {
  return {
    hsCode: UNCLASSIFIED_CODE,
    statSuffix: "",
    articleDescription: "Could not classify",
    productDescription: "",
    reasoning,
    confidence: 0,
    keyCharacteristics: [],
    corrected: false,
  };
}

export function unparseableResult(reason: string): ClassificationResult {
  return {
    status: "unparseable",
    candidates: [placeholderCandidate(`The model response could not be interpreted: ${reason}.`)],
    labelText: emptyLabelText(),
    visualAnalysis: {},
    reason,
    parseStrategy: null,
  };
}

function toCandidate(entry: ModelClassification): ClassificationCandidate {
  return {
    hsCode: entry.hs_code,
    statSuffix: entry.stat_suffix,
    articleDescription: entry.article_description,
    productDescription: entry.product_description,
    reasoning: entry.reasoning,
    confidence: normalizeConfidence(entry.confidence_score),
    keyCharacteristics: entry.key_characteristics,
    corrected: false,
  };
}

function toVisualAnalysis(raw: ModelVisualAnalysis): VisualAnalysis {
  return {
    productType: raw.product_type,
    color: raw.color,
    processingStateObserved: raw.processing_state_observed,
    packaging: raw.packaging,
    decorativeElements: raw.decorative_elements,
    labelTextSummary: raw.label_text_summary,
    twoStepValidation: raw.two_step_validation,
  };
}

export function buildClassificationResult(outcome: ParseOutcome, table: ReferenceTable): ClassificationResult {
  if (!outcome.ok) {
    return unparseableResult(outcome.reason);
  }

  const payload = modelPayloadSchema.parse(outcome.value);
  const visualAnalysis = toVisualAnalysis(payload.visual_analysis);
  const labelText: LabelTextExtraction = {
    visibleText: payload.label_text_extraction.visible_text,
    certificationMarks: payload.label_text_extraction.certification_marks,
    regulatoryMarks: payload.label_text_extraction.regulatory_marks,
    qualifierKeywords: payload.label_text_extraction.qualifier_keywords,
  };

  const parsedCandidates = payload.classifications.flatMap((entry) => {
    const parsed = modelClassificationSchema.safeParse(entry);
    return parsed.success ? [toCandidate(parsed.data)] : [];
  });
  const dropped = payload.classifications.length - parsedCandidates.length;
  if (dropped > 0) {
    logger.warn("Dropped classifications without an hs_code", { dropped });
  }

  const { candidates, corrections } = applyConsistencyRules(parsedCandidates, visualAnalysis, table);
  for (const correction of corrections) {
    logger.info("Applied visual consistency correction", { correction });
  }

  // a correction can land two candidates on the same line; the more confident one stays
  const seen = new Set<string>();
  const ranked = [...candidates]
    .sort((a, b) => b.confidence - a.confidence)
    .filter((candidate) => {
      const key = `${candidate.hsCode}.${candidate.statSuffix}`;
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    })
    .slice(0, MAX_CANDIDATES);

  if (ranked.length === 0) {
    if (payload.not_in_document) {
      const reason = payload.reason ?? "The product is not covered by the reference document.";
      return {
        status: "not_in_document",
        candidates: [placeholderCandidate(reason)],
        labelText,
        visualAnalysis,
        reason,
        parseStrategy: outcome.strategy,
      };
    }
    return { ...unparseableResult("no classifications in model response"), labelText, visualAnalysis, parseStrategy: outcome.strategy };
  }

  return {
    status: "classified",
    candidates: ranked,
    labelText,
    visualAnalysis,
    reason: payload.reason,
    parseStrategy: outcome.strategy,
  };
}
