import fetch, { type RequestInit } from "node-fetch";
import { z } from "zod";

import type { Settings } from "./config.js";
import { logger } from "./logger.js";

export const CHAT_API_VERSION = "2023-05-29";

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().optional(),
});

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
      }),
    )
    .optional(),
  results: z.array(z.object({ generated_text: z.string().optional() })).optional(),
});

export type WatsonxClientSettings = Pick<Settings, "apiKey" | "projectId" | "baseUrl" | "iamUrl" | "modelId" | "timeoutMs">;

export interface VisionChatRequest {
  prompt: string;
  imageBase64: string;
  mimeType: string;
}

export class WatsonxClientError extends Error {
  public readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "WatsonxClientError";
    this.status = status;
  }
}

/** Status and body of an upstream reply, read in full while the timeout is running. */
interface UpstreamReply {
  status: number;
  ok: boolean;
  body: string;
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    throw new WatsonxClientError("watsonx returned a body that is not JSON", 502);
  }
}

export function extractGeneratedText(body: unknown): string {
  const parsed = chatResponseSchema.safeParse(body);
  if (!parsed.success) {
    return "";
  }
  const content = parsed.data.choices?.[0]?.message?.content;
  if (typeof content === "string") {
    return content;
  }
  return parsed.data.results?.[0]?.generated_text ?? "";
}

export class WatsonxClient {
  private accessToken: string | null = null;

  constructor(private readonly settings: WatsonxClientSettings) {
    if (!settings.apiKey) {
      throw new Error("WatsonxClient requires an apiKey");
    }
  }

  async getAccessToken(forceRefresh = false): Promise<string> {
    if (this.accessToken && !forceRefresh) {
      return this.accessToken;
    }

    const body = new URLSearchParams({
      grant_type: "urn:ibm:params:oauth:grant-type:apikey",
      apikey: this.settings.apiKey,
    });
    const response = await this.send(this.settings.iamUrl, {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Accept: "application/json",
      },
      body: body.toString(),
    });
    if (!response.ok) {
      throw new WatsonxClientError(`Failed to get access token: ${response.status} ${response.body}`, response.status);
    }

    const parsed = tokenResponseSchema.safeParse(parseJson(response.body));
    if (!parsed.success) {
      throw new WatsonxClientError("IAM token response did not contain an access_token", 502);
    }
    this.accessToken = parsed.data.access_token;
    return this.accessToken;
  }

  async chat(request: VisionChatRequest): Promise<string> {
    const url = this.chatUrl();
    const payload = JSON.stringify({
      model_id: this.settings.modelId,
      project_id: this.settings.projectId,
      messages: [
        {
          role: "user",
          content: [
            { type: "text", text: request.prompt },
            {
              type: "image_url",
              image_url: { url: `data:${request.mimeType};base64,${request.imageBase64}` },
            },
          ],
        },
      ],
      parameters: {
        decoding_method: "greedy",
        max_new_tokens: 3000,
        temperature: 0,
        min_new_tokens: 100,
      },
    });

    let response = await this.postChat(url, payload, await this.getAccessToken());
    if (response.status === 401) {
      logger.warn("watsonx token rejected, refreshing");
      response = await this.postChat(url, payload, await this.getAccessToken(true));
    }

    if (!response.ok) {
      throw new WatsonxClientError(`watsonx API call failed: ${response.status} ${response.body}`, response.status);
    }

    return extractGeneratedText(parseJson(response.body));
  }

  private chatUrl(): string {
    const base = this.settings.baseUrl.endsWith("/") ? this.settings.baseUrl : `${this.settings.baseUrl}/`;
    const url = new URL("ml/v1/text/chat", base);
    url.searchParams.set("version", CHAT_API_VERSION);
    return url.toString();
  }

  private postChat(url: string, payload: string, token: string): Promise<UpstreamReply> {
    return this.send(url, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${token}`,
        "Content-Type": "application/json",
        Accept: "application/json",
      },
      body: payload,
    });
  }

  // the timer covers the body as well as the headers
  private async send(url: string, init: RequestInit): Promise<UpstreamReply> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.settings.timeoutMs);
    try {
      const response = await fetch(url, { ...init, signal: controller.signal });
      const body = await response.text();
      return { status: response.status, ok: response.ok, body };
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new WatsonxClientError("watsonx request timed out", 504);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new WatsonxClientError(`watsonx request failed: ${message}`, 502);
    } finally {
      clearTimeout(timeout);
    }
  }
}
