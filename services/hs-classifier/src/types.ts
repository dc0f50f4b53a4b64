export type ClassificationStatus = "classified" | "not_in_document" | "unparseable";

export type ParseStrategy = "strict" | "fenced" | "repaired" | "extracted";

export interface ClassificationCandidate {
  hsCode: string;
  statSuffix: string;
  articleDescription: string;
  productDescription: string;
  reasoning: string;
  /** Percentage, always within [0, 100]. */
  confidence: number;
  keyCharacteristics: string[];
  corrected: boolean;
}

export interface LabelTextExtraction {
  visibleText: string[];
  certificationMarks: string[];
  regulatoryMarks: string[];
  qualifierKeywords: string[];
}

export interface VisualAnalysis {
  productType?: string;
  color?: string;
  processingStateObserved?: string;
  packaging?: string;
  decorativeElements?: string;
  labelTextSummary?: string;
  twoStepValidation?: string;
}

export interface ClassificationResult {
  status: ClassificationStatus;
  candidates: ClassificationCandidate[];
  labelText: LabelTextExtraction;
  visualAnalysis: VisualAnalysis;
  reason?: string;
  parseStrategy: ParseStrategy | null;
}

export interface ImageUpload {
  buffer: Buffer;
  mimeType: string;
  fileName: string;
}

export interface ClassificationOutcome {
  result: ClassificationResult;
  data: Record<string, unknown> | null;
  rawResponse: string;
}

export interface ClassifySuccessResponse extends ClassificationOutcome {
  success: true;
}

export interface ClassifyErrorResponse {
  success: false;
  error: string;
}

export type ClassifyApiResponse = ClassifySuccessResponse | ClassifyErrorResponse;
