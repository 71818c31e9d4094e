// src/server/routes/documents.ts
import express, { Router } from "express";
import { z } from "zod";

import type { FillService } from "@/lib/fill/fillService";
import { respond } from "@/server/envelope";
import { asyncRoute } from "@/server/routes/asyncRoute";

export const MAX_TEMPLATE_BYTES = "20mb";

const UploadHeadersSchema = z.object({
  "x-filename": z.string().trim().min(1, "x-filename header is required").max(255),
});

const UploadBodySchema = z.instanceof(Buffer).refine((b) => b.length > 0, "request body is empty");

/** Filenames arrive percent-encoded when they are not plain ASCII. */
function decodeFilename(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

const DocumentParamsSchema = z.object({ id: z.string().min(1) });

export function documentsRouter(service: FillService): Router {
  const router = Router();

  router.post(
    "/",
    express.raw({ type: () => true, limit: MAX_TEMPLATE_BYTES }),
    asyncRoute(async (req, res) => {
      const { "x-filename": filename } = UploadHeadersSchema.parse(req.headers);
      const bytes = UploadBodySchema.parse(req.body);
      const doc = await service.uploadTemplate(decodeFilename(filename), bytes);
      respond(res, 201, doc);
    }),
  );

  router.get(
    "/:id",
    asyncRoute(async (req, res) => {
      const { id } = DocumentParamsSchema.parse(req.params);
      respond(res, 200, await service.getDocument(id));
    }),
  );

  router.post(
    "/:id/extract",
    asyncRoute(async (req, res) => {
      const { id } = DocumentParamsSchema.parse(req.params);
      respond(res, 200, { placeholders: await service.extractPlaceholders(id) });
    }),
  );

  router.get(
    "/:id/placeholders",
    asyncRoute(async (req, res) => {
      const { id } = DocumentParamsSchema.parse(req.params);
      respond(res, 200, { placeholders: await service.listPlaceholders(id) });
    }),
  );

  return router;
}
