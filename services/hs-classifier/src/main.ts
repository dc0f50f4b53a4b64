import path from "node:path";
import { config as loadDotenv } from "dotenv";
import express, { type NextFunction, type Request, type Response } from "express";
import morgan from "morgan";

import { DEFAULT_MAX_UPLOAD_BYTES, SERVICE_ROOT, loadSettings } from "./config.js";
import { logger } from "./logger.js";
import { ClassifierError, HsClassificationService, createService } from "./service.js";
import type { ClassifyApiResponse, ClassifyErrorResponse } from "./types.js";
import { UploadRejectedError, imageUpload } from "./upload.js";

export interface AppOptions {
  maxUploadBytes?: number;
  assetDir?: string;
}

export function createApp(service: HsClassificationService, options: AppOptions = {}) {
  const maxUploadBytes = options.maxUploadBytes ?? DEFAULT_MAX_UPLOAD_BYTES;
  const indexPage = path.join(options.assetDir ?? SERVICE_ROOT, "public", "index.html");

  const app = express();
  app.use(
    morgan("tiny", {
      stream: { write: (line: string) => logger.info(line.trim(), { source: "http" }) },
    }),
  );

  app.get("/", (_req, res, next) => {
    res.sendFile(indexPage, (error) => {
      if (error) {
        next(error);
      }
    });
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post(
    "/api/classify-hs-code",
    imageUpload(maxUploadBytes),
    async (req: Request, res: Response<ClassifyApiResponse>, next: NextFunction) => {
      const file = req.file;
      if (!file) {
        res.status(400).json({ success: false, error: "missing file" });
        return;
      }

      try {
        const outcome = await service.classify({
          buffer: file.buffer,
          mimeType: file.mimetype,
          fileName: file.originalname,
        });
        res.json({ success: true, ...outcome });
      } catch (error) {
        next(error);
      }
    },
  );

  app.use((error: unknown, _req: Request, res: Response<ClassifyErrorResponse>, _next: NextFunction) => {
    if (error instanceof UploadRejectedError) {
      res.status(error.status).json({ success: false, error: error.message });
      return;
    }
    if (error instanceof ClassifierError) {
      logger.error("Classification failed", error, { status: error.status });
      res.status(error.status).json({ success: false, error: error.message });
      return;
    }
    logger.error("Unhandled request error", error);
    res.status(500).json({
      success: false,
      error: error instanceof Error ? error.message : "Unknown error",
    });
  });

  return app;
}

if (import.meta.url === `file://${process.argv[1]}`) {
  loadDotenv();
  const settings = loadSettings();
  const app = createApp(createService(settings), {
    maxUploadBytes: settings.maxUploadBytes,
    assetDir: settings.assetDir,
  });
  app.listen(settings.port, () => {
    logger.info(`HS code classifier listening on port ${settings.port}`);
  });
}
