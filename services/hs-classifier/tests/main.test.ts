import nock from "nock";
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { SERVICE_ROOT, type Settings } from "../src/config.js";
import { createApp } from "../src/main.js";
import { createService } from "../src/service.js";

const iamOrigin = "https://iam.test";
const watsonxOrigin = "https://watsonx.test";

const settings: Settings = {
  apiKey: "test-key",
  projectId: "project-1",
  baseUrl: watsonxOrigin,
  iamUrl: `${iamOrigin}/identity/token`,
  modelId: "meta-llama/llama-3-2-90b-vision-instruct",
  timeoutMs: 5_000,
  maxUploadBytes: 10 * 1024 * 1024,
  port: 0,
  assetDir: SERVICE_ROOT,
};

const modelPayload = {
  label_text_extraction: {
    visible_text: ["Mountain Roast", "340 g"],
    certification_marks: [],
    regulatory_marks: [],
    qualifier_keywords: [],
  },
  classifications: [
    {
      hs_code: "0901.21.00",
      stat_suffix: "49",
      article_description:
        "Coffee, roasted: Not decaffeinated: In retail containers weighing 2 kg or less: Other: Other",
      product_description: "Dark roasted whole beans in a retail bag",
      reasoning: "The beans are dark brown and the bag shows no organic or variety text.",
      confidence_score: 0.82,
      key_characteristics: ["dark brown beans", "retail bag"],
    },
  ],
  visual_analysis: {
    product_type: "coffee beans",
    color: "dark brown",
    processing_state_observed: "Processed (roasted)",
  },
  not_in_document: false,
};

function chatReply(content: string) {
  return {
    id: "chat-1",
    model_id: settings.modelId,
    choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: "stop" }],
  };
}

function mockToken() {
  return nock(iamOrigin)
    .post("/identity/token", (body: unknown) => {
      const form = typeof body === "string" ? Object.fromEntries(new URLSearchParams(body)) : body;
      return typeof form === "object" && form !== null && "apikey" in form && form.apikey === "test-key";
    })
    .reply(200, { access_token: "token-1", expires_in: 3600 });
}

function buildApp(maxUploadBytes?: number) {
  return createApp(createService(settings), { maxUploadBytes, assetDir: SERVICE_ROOT });
}

beforeEach(() => {
  nock.cleanAll();
  nock.disableNetConnect();
  nock.enableNetConnect(/127\.0\.0\.1|localhost/);
});

afterEach(() => {
  nock.cleanAll();
  nock.enableNetConnect();
});

describe("POST /api/classify-hs-code", () => {
  it("classifies an uploaded image and passes the model JSON through", async () => {
    const image = Buffer.from("png-bytes");
    let chatBody: unknown;
    const tokenScope = mockToken();
    const chatScope = nock(watsonxOrigin)
      .post("/ml/v1/text/chat", (body: unknown) => {
        chatBody = body;
        return true;
      })
      .query({ version: "2023-05-29" })
      .matchHeader("authorization", "Bearer token-1")
      .reply(200, chatReply(JSON.stringify(modelPayload)));

    const response = await request(buildApp())
      .post("/api/classify-hs-code")
      .attach("file", image, { filename: "beans.png", contentType: "image/png" });

    expect(response.status, JSON.stringify(response.body)).toBe(200);
    expect(response.body.success).toBe(true);
    expect(response.body.data).toEqual(modelPayload);
    expect(response.body.rawResponse).toBe(JSON.stringify(modelPayload));
    expect(response.body.result.status).toBe("classified");
    expect(response.body.result.parseStrategy).toBe("strict");
    expect(response.body.result.candidates).toEqual([
      {
        hsCode: "0901.21.00",
        statSuffix: "49",
        articleDescription:
          "Coffee, roasted: Not decaffeinated: In retail containers weighing 2 kg or less: Other: Other",
        productDescription: "Dark roasted whole beans in a retail bag",
        reasoning: "The beans are dark brown and the bag shows no organic or variety text.",
        confidence: 82,
        keyCharacteristics: ["dark brown beans", "retail bag"],
        corrected: false,
      },
    ]);
    expect(response.body.result.labelText.visibleText).toEqual(["Mountain Roast", "340 g"]);

    expect(tokenScope.isDone()).toBe(true);
    expect(chatScope.isDone()).toBe(true);
    expect(chatBody).toMatchObject({
      model_id: "meta-llama/llama-3-2-90b-vision-instruct",
      project_id: "project-1",
      parameters: { decoding_method: "greedy", max_new_tokens: 3000, temperature: 0, min_new_tokens: 100 },
      messages: [
        {
          role: "user",
          content: [
            { type: "text" },
            { type: "image_url", image_url: { url: `data:image/png;base64,${image.toString("base64")}` } },
          ],
        },
      ],
    });
  });

  it("unwraps a reply fenced in markdown", async () => {
    mockToken();
    nock(watsonxOrigin)
      .post("/ml/v1/text/chat")
      .query(true)
      .reply(200, chatReply(`\`\`\`json\n${JSON.stringify(modelPayload, null, 2)}\n\`\`\``));

    const response = await request(buildApp())
      .post("/api/classify-hs-code")
      .attach("file", Buffer.from("jpeg-bytes"), { filename: "beans.jpg", contentType: "image/jpeg" });

    expect(response.status, JSON.stringify(response.body)).toBe(200);
    expect(response.body.result.parseStrategy).toBe("fenced");
    expect(response.body.data).toEqual(modelPayload);
    expect(response.body.result.candidates[0].hsCode).toBe("0901.21.00");
  });

  it("returns the fallback result when the reply is not JSON", async () => {
    mockToken();
    nock(watsonxOrigin)
      .post("/ml/v1/text/chat")
      .query(true)
      .reply(200, chatReply("I cannot identify this product."));

    const response = await request(buildApp())
      .post("/api/classify-hs-code")
      .attach("file", Buffer.from("gif-bytes"), { filename: "thing.gif", contentType: "image/gif" });

    expect(response.status, JSON.stringify(response.body)).toBe(200);
    expect(response.body.success).toBe(true);
    expect(response.body.data).toBeNull();
    expect(response.body.rawResponse).toBe("I cannot identify this product.");
    expect(response.body.result.status).toBe("unparseable");
    expect(response.body.result.parseStrategy).toBeNull();
    expect(response.body.result.candidates).toEqual([
      {
        hsCode: "UNCLASSIFIED",
        statSuffix: "",
        articleDescription: "Could not classify",
        productDescription: "",
        reasoning: "The model response could not be interpreted: no JSON object found in model response.",
        confidence: 0,
        keyCharacteristics: [],
        corrected: false,
      },
    ]);
  });

  it("rejects a disallowed file type before calling the model", async () => {
    const tokenScope = mockToken();

    const response = await request(buildApp())
      .post("/api/classify-hs-code")
      .attach("file", Buffer.from("%PDF-1.4"), { filename: "invoice.pdf", contentType: "application/pdf" });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ success: false, error: "File type .pdf not allowed" });
    expect(tokenScope.isDone()).toBe(false);
  });

  it("rejects a content type outside the allow-list even with an image extension", async () => {
    const tokenScope = mockToken();

    const response = await request(buildApp())
      .post("/api/classify-hs-code")
      .attach("file", Buffer.from("<svg/>"), { filename: "logo.png", contentType: "image/svg+xml" });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ success: false, error: "Content type image/svg+xml not allowed" });
    expect(tokenScope.isDone()).toBe(false);
  });

  it("rejects a file over the size ceiling before calling the model", async () => {
    const tokenScope = mockToken();

    const response = await request(buildApp(16))
      .post("/api/classify-hs-code")
      .attach("file", Buffer.alloc(64, 1), { filename: "large.webp", contentType: "image/webp" });

    expect(response.status).toBe(413);
    expect(response.body).toEqual({ success: false, error: "File exceeds the 16 byte upload limit" });
    expect(tokenScope.isDone()).toBe(false);
  });

  it("rejects a truncated multipart body", async () => {
    const tokenScope = mockToken();
    const body = [
      "--test-boundary",
      'Content-Disposition: form-data; name="file"; filename="beans.png"',
      "Content-Type: image/png",
      "",
      "png-bytes",
    ].join("\r\n");

    const response = await request(buildApp())
      .post("/api/classify-hs-code")
      .set("Content-Type", "multipart/form-data; boundary=test-boundary")
      .send(body);

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      success: false,
      error: "Malformed multipart body: Unexpected end of form",
    });
    expect(tokenScope.isDone()).toBe(false);
  });

  it("requires a file", async () => {
    const response = await request(buildApp()).post("/api/classify-hs-code").field("note", "no image");

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ success: false, error: "missing file" });
  });

  it("surfaces an upstream server error with its status", async () => {
    mockToken();
    nock(watsonxOrigin).post("/ml/v1/text/chat").query(true).reply(503, "model overloaded");

    const response = await request(buildApp())
      .post("/api/classify-hs-code")
      .attach("file", Buffer.from("png-bytes"), { filename: "beans.png", contentType: "image/png" });

    expect(response.status).toBe(503);
    expect(response.body).toEqual({ success: false, error: "watsonx API call failed: 503 model overloaded" });
  });

  it("maps a network failure to 502", async () => {
    mockToken();
    nock(watsonxOrigin).post("/ml/v1/text/chat").query(true).replyWithError("connection reset");

    const response = await request(buildApp())
      .post("/api/classify-hs-code")
      .attach("file", Buffer.from("png-bytes"), { filename: "beans.png", contentType: "image/png" });

    expect(response.status).toBe(502);
    expect(response.body.success).toBe(false);
    expect(response.body.error).toMatch(/^watsonx request failed: .*connection reset/);
  });

  it("returns no data when fields could only be scraped from the reply", async () => {
    const reply = 'Best match "hs_code": "0902.30.00", "stat_suffix": "90", "confidence_score": 0.7 (cut off';
    mockToken();
    nock(watsonxOrigin).post("/ml/v1/text/chat").query(true).reply(200, chatReply(reply));

    const response = await request(buildApp())
      .post("/api/classify-hs-code")
      .attach("file", Buffer.from("png-bytes"), { filename: "tea.png", contentType: "image/png" });

    expect(response.status, JSON.stringify(response.body)).toBe(200);
    expect(response.body.data).toBeNull();
    expect(response.body.rawResponse).toBe(reply);
    expect(response.body.result.parseStrategy).toBe("extracted");
    expect(response.body.result.candidates).toEqual([
      {
        hsCode: "0902.30.00",
        statSuffix: "90",
        articleDescription: "",
        productDescription: "",
        reasoning: "",
        confidence: 70,
        keyCharacteristics: [],
        corrected: false,
      },
    ]);
  });

  it("maps an authentication failure to 502", async () => {
    nock(iamOrigin).post("/identity/token").reply(400, "invalid api key");

    const response = await request(buildApp())
      .post("/api/classify-hs-code")
      .attach("file", Buffer.from("png-bytes"), { filename: "beans.png", contentType: "image/png" });

    expect(response.status).toBe(502);
    expect(response.body).toEqual({ success: false, error: "Failed to get access token: 400 invalid api key" });
  });
});

describe("static routes", () => {
  it("serves the upload page", async () => {
    const response = await request(buildApp()).get("/");

    expect(response.status).toBe(200);
    expect(response.headers["content-type"]).toMatch(/text\/html/);
    expect(response.text).toContain("<title>HS Code Classifier</title>");
  });

  it("reports health", async () => {
    const response = await request(buildApp()).get("/health");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: "ok" });
  });
});
