import { buildClassificationResult } from "./classifier.js";
import type { Settings } from "./config.js";
import { logger } from "./logger.js";
import { parseModelResponse } from "./parser.js";
import { buildClassificationPrompt, loadPromptTemplate } from "./prompt.js";
import { loadReferenceTable, type ReferenceTable } from "./reference.js";
import type { ClassificationOutcome, ImageUpload } from "./types.js";
import { WatsonxClient, WatsonxClientError, type VisionChatRequest } from "./watsonxClient.js";

export class ClassifierError extends Error {
  constructor(
    message: string,
    public readonly status = 502,
  ) {
    super(message);
    this.name = "ClassifierError";
  }
}

export interface VisionModel {
  chat(request: VisionChatRequest): Promise<string>;
}

export class HsClassificationService {
  private readonly prompt: string;

  constructor(
    private readonly model: VisionModel,
    private readonly table: ReferenceTable,
    promptTemplate: string,
  ) {
    this.prompt = buildClassificationPrompt(promptTemplate, table);
  }

  async classify(upload: ImageUpload): Promise<ClassificationOutcome> {
    const started = Date.now();
    let rawResponse: string;
    try {
      rawResponse = await this.model.chat({
        prompt: this.prompt,
        imageBase64: upload.buffer.toString("base64"),
        mimeType: upload.mimeType,
      });
    } catch (error) {
      const status = error instanceof WatsonxClientError && error.status && error.status >= 500 ? error.status : 502;
      throw new ClassifierError(error instanceof Error ? error.message : String(error), status);
    }

    const parsed = parseModelResponse(rawResponse);
    const result = buildClassificationResult(parsed, this.table);

    logger.info("Classification finished", {
      fileName: upload.fileName,
      bytes: upload.buffer.length,
      responseLength: rawResponse.length,
      parseStrategy: result.parseStrategy,
      status: result.status,
      topCode: result.candidates[0]?.hsCode,
      durationMs: Date.now() - started,
    });
    logger.debug("Model response preview", { preview: rawResponse.slice(0, 200) });
    if (!parsed.ok) {
      logger.warn("Model response could not be parsed", { reason: parsed.reason });
    }

    return {
      result,
      data: parsed.ok && parsed.strategy !== "extracted" ? parsed.value : null,
      rawResponse,
    };
  }
}

export function createService(settings: Settings): HsClassificationService {
  return new HsClassificationService(
    new WatsonxClient(settings),
    loadReferenceTable(settings.assetDir),
    loadPromptTemplate(settings.assetDir),
  );
}
