import { z } from "zod";

const text = z.string().catch("");
const textList = z.array(z.coerce.string()).catch([]);
const code = z.union([z.string(), z.number()]).transform((value) => String(value).trim());

export const modelClassificationSchema = z
  .object({
    hs_code: code.pipe(z.string().min(1)),
    stat_suffix: code.catch(""),
    article_description: text,
    product_description: text,
    reasoning: text,
    confidence_score: z.unknown(),
    key_characteristics: textList,
  })
  .passthrough();

export const labelTextExtractionSchema = z.object({
  visible_text: textList,
  certification_marks: textList,
  regulatory_marks: textList,
  qualifier_keywords: textList,
});

export const visualAnalysisSchema = z
  .object({
    product_type: z.string().optional().catch(undefined),
    color: z.string().optional().catch(undefined),
    processing_state_observed: z.string().optional().catch(undefined),
    packaging: z.string().optional().catch(undefined),
    decorative_elements: z.string().optional().catch(undefined),
    label_text_summary: z.string().optional().catch(undefined),
    two_step_validation: z.string().optional().catch(undefined),
  })
  .passthrough();

export const modelPayloadSchema = z
  .object({
    label_text_extraction: labelTextExtractionSchema.catch({
      visible_text: [],
      certification_marks: [],
      regulatory_marks: [],
      qualifier_keywords: [],
    }),
    // entries are validated one at a time so a single bad candidate does not sink the rest
    classifications: z.array(z.unknown()).catch([]),
    visual_analysis: visualAnalysisSchema.catch({}),
    not_in_document: z.boolean().catch(false),
    reason: z.string().optional().catch(undefined),
  })
  .passthrough();

export type ModelClassification = z.infer<typeof modelClassificationSchema>;
export type ModelPayload = z.infer<typeof modelPayloadSchema>;
export type ModelVisualAnalysis = z.infer<typeof visualAnalysisSchema>;
