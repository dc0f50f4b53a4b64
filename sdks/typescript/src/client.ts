import type { ClassifyOptions, ClassifyResponse, HealthResponse } from './types.js';

export interface HsClassifierClientOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
  headers?: Record<string, string>;
}

export class HsClassifierRequestError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(message);
    this.name = 'HsClassifierRequestError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isClassifyResponse(value: unknown): value is ClassifyResponse {
  return isRecord(value) && value.success === true && isRecord(value.result) && typeof value.rawResponse === 'string';
}

function isHealthResponse(value: unknown): value is HealthResponse {
  return isRecord(value) && typeof value.status === 'string';
}

export class HsClassifierClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: HsClassifierClientOptions) {
    if (!options.baseUrl) {
      throw new Error('baseUrl is required');
    }
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.defaultHeaders = options.headers ?? {};
  }

  async classify(image: Blob | Uint8Array, options: ClassifyOptions): Promise<ClassifyResponse> {
    if (!options.fileName) {
      throw new Error('fileName is required');
    }

    const file = image instanceof Blob ? image : new Blob([image], { type: options.mimeType });
    const form = new FormData();
    form.append('file', file, options.fileName);

    // no Content-Type header: fetch sets the multipart boundary itself
    const response = await this.fetchImpl(`${this.baseUrl}/api/classify-hs-code`, {
      method: 'POST',
      headers: this.defaultHeaders,
      body: form,
    });

    if (!response.ok) {
      const body = await this.readErrorBody(response);
      throw new HsClassifierRequestError(`Classify request failed with ${response.status}: ${body}`, response.status, body);
    }

    const payload: unknown = await response.json();
    if (!isClassifyResponse(payload)) {
      throw new Error('Classify response did not match the expected shape');
    }
    return payload;
  }

  async health(): Promise<HealthResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}/health`, {
      method: 'GET',
      headers: this.defaultHeaders,
    });

    if (!response.ok) {
      const body = await this.readErrorBody(response);
      throw new HsClassifierRequestError(`Health request failed with ${response.status}: ${body}`, response.status, body);
    }

    const payload: unknown = await response.json();
    if (!isHealthResponse(payload)) {
      throw new Error('Health response did not match the expected shape');
    }
    return payload;
  }

  private async readErrorBody(response: Response): Promise<string> {
    try {
      const text = await response.text();
      return text || '<empty>';
    } catch (err) {
      return `<failed to read error body: ${String(err)}>`;
    }
  }
}

export * from './types.js';
