// src/server/app.ts
import express, { type Express, type NextFunction, type Request, type Response } from "express";

import type { FillService } from "@/lib/fill/fillService";
import { type ApiEnvelope, correlationIdOf, makeCorrelationId, respond, respondError } from "@/server/envelope";
import { documentsRouter } from "@/server/routes/documents";
import { sessionsRouter } from "@/server/routes/sessions";

export function createApp(service: FillService): Express {
  const app = express();
  app.disable("x-powered-by");

  app.use((req: Request, res: Response, next: NextFunction) => {
    const incoming = req.header("x-correlation-id");
    const correlationId = incoming && incoming.length <= 64 ? incoming : makeCorrelationId();
    res.locals.correlationId = correlationId;
    res.set("x-correlation-id", correlationId);
    next();
  });

  // ── Routes ──────────────────────────────────────────────
  app.use("/documents", documentsRouter(service));
  app.use("/sessions", sessionsRouter(service));

  // ── Health ──────────────────────────────────────────────
  app.get("/health", (_req, res) => {
    respond(res, 200, { service: "template-fill-engine" });
  });

  app.use((req: Request, res: Response) => {
    const correlationId = correlationIdOf(res);
    res.status(404).json({
      ok: false,
      error: { code: "ROUTE_NOT_FOUND", message: `no route for ${req.method} ${req.path}`, correlationId, recoverable: false },
      meta: { correlationId, ts: new Date().toISOString() },
    } satisfies ApiEnvelope<never>);
  });

  // Four arguments: Express only treats it as an error handler with this arity.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    respondError(res, err);
  });

  return app;
}
