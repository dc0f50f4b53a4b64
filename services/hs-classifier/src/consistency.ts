import { findEntry, type ReferenceTable } from "./reference.js";
import type { ClassificationCandidate, VisualAnalysis } from "./types.js";

export type ObservedState = "processed" | "unprocessed" | "unknown";

// multi-word and negated phrases first: they are removed before the processed terms are checked
const UNPROCESSED_TERMS = [
  "not roasted", "not processed", "not fermented", "not cooked", "not dried",
  "unprocessed", "unroasted", "raw", "fresh", "green", "light", "pale", "white",
];
const PROCESSED_TERMS = ["processed", "roasted", "cooked", "dried", "fermented", "charred", "brown", "black", "dark"];

interface CorrectionRule {
  codePrefix: string;
  contradictedBy: Exclude<ObservedState, "unknown">;
  target: { hsCode: string; statSuffix: string };
  reasoning: string;
  descriptionRewrites: Array<[RegExp, string]>;
}

const RULES: CorrectionRule[] = [
  {
    codePrefix: "0901.11",
    contradictedBy: "processed",
    target: { hsCode: "0901.21.00", statSuffix: "49" },
    reasoning:
      "The product shows a dark brown, processed appearance, which places it among roasted coffee. "
      + "No organic certification or variety text is visible on the packaging, so the general Other line "
      + "of the roasted category applies. (Adjusted by visual consistency check.)",
    descriptionRewrites: [
      [/\bunprocessed\b/gi, "processed"],
      [/\bnot roasted\b/gi, "roasted"],
      [/\braw\b/gi, "roasted"],
      [/\bgreen\b/gi, "dark brown roasted"],
    ],
  },
  {
    codePrefix: "0901.21",
    contradictedBy: "unprocessed",
    target: { hsCode: "0901.11.00", statSuffix: "65" },
    reasoning:
      "The product shows a light or green, unprocessed appearance, which places it among coffee that is "
      + "not roasted. No organic certification or variety text is visible on the packaging, so the general "
      + "Other line of the not-roasted category applies. (Adjusted by visual consistency check.)",
    descriptionRewrites: [
      [/(?<!not )\broasted\b/gi, "not roasted"],
      [/\bprocessed\b/gi, "unprocessed"],
      [/\bcooked\b/gi, "raw"],
      [/\bdark brown\b/gi, "light green"],
    ],
  },
];

function containsTerm(text: string, term: string): boolean {
  return new RegExp(`\\b${term}\\b`).test(text);
}

export function observedState(visual: VisualAnalysis): ObservedState {
  let text = `${visual.color ?? ""} ${visual.processingStateObserved ?? ""}`.toLowerCase();

  const unprocessed = UNPROCESSED_TERMS.some((term) => containsTerm(text, term));
  for (const term of UNPROCESSED_TERMS) {
    text = text.replace(new RegExp(`\\b${term}\\b`, "g"), " ");
  }
  const processed = PROCESSED_TERMS.some((term) => containsTerm(text, term));

  if (processed && !unprocessed) {
    return "processed";
  }
  if (unprocessed && !processed) {
    return "unprocessed";
  }
  return "unknown";
}

/** `0901.21.00.65` becomes code `0901.21.00` with suffix `65`; a numeric suffix already given wins. */
export function splitEmbeddedSuffix(candidate: ClassificationCandidate): ClassificationCandidate {
  const parts = candidate.hsCode.split(".");
  if (parts.length < 4 || !/^\d+$/.test(parts[3])) {
    return candidate;
  }
  const existing = candidate.statSuffix.replace(/\./g, "");
  return {
    ...candidate,
    hsCode: parts.slice(0, 3).join("."),
    statSuffix: /^\d+$/.test(existing) ? candidate.statSuffix : parts[3],
  };
}

export interface ConsistencyOutcome {
  candidates: ClassificationCandidate[];
  corrections: string[];
}

export function applyConsistencyRules(
  candidates: ClassificationCandidate[],
  visual: VisualAnalysis,
  table: ReferenceTable,
): ConsistencyOutcome {
  const state = observedState(visual);
  const corrections: string[] = [];

  const checked = candidates.map((original) => {
    const candidate = splitEmbeddedSuffix(original);
    const rule = RULES.find(
      (item) => candidate.hsCode.startsWith(item.codePrefix) && item.contradictedBy === state,
    );
    if (!rule) {
      return candidate;
    }

    const entry = findEntry(table, rule.target.hsCode, rule.target.statSuffix);
    const productDescription = rule.descriptionRewrites.reduce(
      (text, [pattern, replacement]) => text.replace(pattern, replacement),
      candidate.productDescription,
    );
    corrections.push(
      `${candidate.hsCode}.${candidate.statSuffix || "??"} -> ${rule.target.hsCode}.${rule.target.statSuffix} (observed ${state})`,
    );

    return {
      ...candidate,
      hsCode: rule.target.hsCode,
      statSuffix: rule.target.statSuffix,
      articleDescription: entry?.description ?? candidate.articleDescription,
      productDescription,
      reasoning: rule.reasoning,
      corrected: true,
    };
  });

  return { candidates: checked, corrections };
}
