import { Router, type Response } from "express";
import { pdfStructureFieldsSchema, structureRequestSchema } from "@shared/schema";
import type { EnvironmentConfig } from "../config/environment";
import { createPdfUpload, uploadLimiter } from "../middleware/security";
import type { DocumentStructureProcessor, ProcessingResult } from "../services/documentStructureProcessor";
import { serializeStructureResponse } from "../services/structureSerializer";
import { monitoring } from "../utils/monitoring";
import { HttpError } from "../utils/errors";

// res.json would reorder integer-like chapter keys
function sendStructure(res: Response, result: ProcessingResult) {
  monitoring.recordDocument(result.warnings.length);
  res.status(200).type("application/json").send(serializeStructureResponse(result));
}

export function createStructureRouter(
  processor: DocumentStructureProcessor,
  config: Pick<EnvironmentConfig, "MAX_UPLOAD_MB">,
) {
  // Rejections are thrown so both routes answer errorHandler's { error, details? }
  const r = Router();
  const upload = createPdfUpload(config.MAX_UPLOAD_MB);

  // Split already-extracted page texts along a supplied outline
  r.post("/api/structure", (req, res, next) => {
    try {
      const result = structureRequestSchema.safeParse(req.body);
      if (!result.success) {
        throw new HttpError(400, "Invalid request data", result.error.errors);
      }

      const { outline, pages, startPage, options } = result.data;
      console.log(`📥 Structure request: ${outline.length} outline entries, ${pages.length} pages`);

      sendStructure(res, processor.process(outline, pages, { startPage, ...options }));
    } catch (error) {
      next(error);
    }
  });

  // Upload a PDF and split it along its own outline
  r.post("/api/structure/pdf", uploadLimiter, upload.single("file"), async (req, res, next) => {
    try {
      if (!req.file) {
        throw new HttpError(400, "No PDF uploaded (expected multipart field \"file\")");
      }

      const fields = pdfStructureFieldsSchema.safeParse(req.body);
      if (!fields.success) {
        throw new HttpError(400, "Invalid request data", fields.error.errors);
      }

      console.log(`📥 PDF upload: ${req.file.originalname} (${req.file.size} bytes)`);
      const processed = await processor.processPdf(req.file.buffer, fields.data);
      sendStructure(res, processed);
    } catch (error) {
      next(error);
    }
  });

  return r;
}
