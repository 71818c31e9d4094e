// src/server/routes/sessions.ts
import contentDisposition from "content-disposition";
import express, { Router } from "express";
import { z } from "zod";

import type { FillService } from "@/lib/fill/fillService";
import { respond } from "@/server/envelope";
import { asyncRoute } from "@/server/routes/asyncRoute";

const CreateSessionSchema = z.object({ documentId: z.string().min(1) });

const ChatSchema = z.object({ text: z.string().max(10_000) });

const RenderQuerySchema = z.object({
  mode: z.enum(["final", "preview"]).default("final"),
});

const SessionParamsSchema = z.object({ id: z.string().min(1) });

export function sessionsRouter(service: FillService): Router {
  const router = Router();
  router.use(express.json({ limit: "256kb" }));

  router.post(
    "/",
    asyncRoute(async (req, res) => {
      const { documentId } = CreateSessionSchema.parse(req.body);
      respond(res, 201, await service.createSession(documentId));
    }),
  );

  router.get(
    "/:id",
    asyncRoute(async (req, res) => {
      const { id } = SessionParamsSchema.parse(req.params);
      respond(res, 200, await service.getSession(id));
    }),
  );

  router.post(
    "/:id/chat",
    asyncRoute(async (req, res) => {
      const { id } = SessionParamsSchema.parse(req.params);
      const { text } = ChatSchema.parse(req.body);
      respond(res, 200, await service.chat(id, text));
    }),
  );

  router.get(
    "/:id/render",
    asyncRoute(async (req, res) => {
      const { id } = SessionParamsSchema.parse(req.params);
      const { mode } = RenderQuerySchema.parse(req.query);
      const artifact = await service.render(id, mode);

      res
        .status(200)
        .set({
          "content-type": artifact.contentType,
          "content-disposition": contentDisposition(artifact.filename, {
            type: mode === "preview" ? "inline" : "attachment",
          }),
          "cache-control": "no-store, max-age=0",
        })
        .send(artifact.bytes);
    }),
  );

  return router;
}
