import path from "node:path";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import multer from "multer";

import { ALLOWED_EXTENSIONS, ALLOWED_MIME_TYPES } from "./config.js";

export const UPLOAD_FIELD = "file";

export class UploadRejectedError extends Error {
  constructor(
    message: string,
    public readonly status = 400,
  ) {
    super(message);
    this.name = "UploadRejectedError";
  }
}

function isAllowed<T extends string>(allowed: readonly T[], value: string): value is T {
  return allowed.some((item) => item === value);
}

export function checkImageType(fileName: string, mimeType: string): void {
  const extension = path.extname(fileName).toLowerCase();
  if (!isAllowed(ALLOWED_EXTENSIONS, extension)) {
    throw new UploadRejectedError(`File type ${extension || "(none)"} not allowed`);
  }
  if (!isAllowed(ALLOWED_MIME_TYPES, mimeType.toLowerCase())) {
    throw new UploadRejectedError(`Content type ${mimeType} not allowed`);
  }
}

/**
 * Single-file image upload held in memory. Type and size are enforced while the
 * body streams in, so a rejected upload never reaches the route handler.
 */
export function imageUpload(maxBytes: number): RequestHandler {
  const handler = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxBytes, files: 1 },
    fileFilter: (_req, file, callback) => {
      try {
        checkImageType(file.originalname, file.mimetype);
        callback(null, true);
      } catch (error) {
        callback(error instanceof Error ? error : new Error(String(error)));
      }
    },
  }).single(UPLOAD_FIELD);

  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res, (error?: unknown) => {
      if (error instanceof multer.MulterError) {
        if (error.code === "LIMIT_FILE_SIZE") {
          next(new UploadRejectedError(`File exceeds the ${maxBytes} byte upload limit`, 413));
          return;
        }
        next(new UploadRejectedError(error.message));
        return;
      }
      // body parser errors such as a truncated form
      if (error instanceof Error && !(error instanceof UploadRejectedError)) {
        next(new UploadRejectedError(`Malformed multipart body: ${error.message}`));
        return;
      }
      next(error);
    });
  };
}
