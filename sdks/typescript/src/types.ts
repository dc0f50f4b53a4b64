export type ClassificationStatus = 'classified' | 'not_in_document' | 'unparseable';

export type ParseStrategy = 'strict' | 'fenced' | 'repaired' | 'extracted';

export interface ClassificationCandidate {
  hsCode: string;
  statSuffix: string;
  articleDescription: string;
  productDescription: string;
  reasoning: string;
  /** 0 to 100 */
  confidence: number;
  keyCharacteristics: string[];
  /** Set when the service rewrote the model's code after checking the visual analysis. */
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

export interface ClassifyResponse {
  success: true;
  /** The model's JSON as it was returned, or null when it could not be parsed. */
  data: Record<string, unknown> | null;
  result: ClassificationResult;
  rawResponse: string;
}

export interface ClassifyOptions {
  fileName: string;
  mimeType: string;
}

export interface HealthResponse {
  status: string;
}
