import { fileURLToPath } from "node:url";
import { z } from "zod";

export const SERVICE_ROOT = fileURLToPath(new URL("..", import.meta.url));

export const ALLOWED_MIME_TYPES = ["image/jpeg", "image/png", "image/gif", "image/webp"] as const;
export const ALLOWED_EXTENSIONS = [".jpg", ".jpeg", ".png", ".gif", ".webp"] as const;
export const DEFAULT_MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

const settingsSchema = z.object({
  apiKey: z.string().min(1, "WATSONX_API_KEY is required"),
  projectId: z.string().min(1, "WATSONX_PROJECT_ID is required"),
  baseUrl: z.string().url(),
  iamUrl: z.string().url(),
  modelId: z.string().min(1),
  timeoutMs: z.number().int().positive(),
  maxUploadBytes: z.number().int().positive(),
  port: z.number().int().nonnegative(),
  assetDir: z.string().min(1),
});

export type Settings = z.infer<typeof settingsSchema>;

const defaults = {
  baseUrl: "https://us-south.ml.cloud.ibm.com",
  iamUrl: "https://iam.cloud.ibm.com/identity/token",
  modelId: "meta-llama/llama-3-2-90b-vision-instruct",
  timeoutMs: 60_000,
  port: 7001,
};

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return settingsSchema.parse({
    apiKey: env.WATSONX_API_KEY ?? "",
    projectId: env.WATSONX_PROJECT_ID ?? "",
    baseUrl: env.WATSONX_URL ?? defaults.baseUrl,
    iamUrl: env.WATSONX_IAM_URL ?? defaults.iamUrl,
    modelId: env.WATSONX_MODEL_ID ?? defaults.modelId,
    timeoutMs: Number(env.WATSONX_TIMEOUT_MS ?? defaults.timeoutMs),
    maxUploadBytes: Number(env.MAX_UPLOAD_BYTES ?? DEFAULT_MAX_UPLOAD_BYTES),
    port: Number(env.PORT ?? defaults.port),
    assetDir: env.HS_CLASSIFIER_ASSET_DIR ?? SERVICE_ROOT,
  });
}
