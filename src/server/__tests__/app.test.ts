import test from "node:test";
import assert from "node:assert/strict";
import { once } from "node:events";
import type { AddressInfo } from "node:net";
import { z } from "zod";

import type { LanguageModel } from "@/lib/ai/provider";
import { type FillRepository, createMemoryFillRepository } from "@/lib/db/store";
import { ModelTimeoutError } from "@/lib/fill/errors";
import { createFillService } from "@/lib/fill/fillService";
import { createMemoryBlobStore } from "@/lib/storage/blobStore";
import { ScriptedModel } from "@/lib/testing/fakes";
import { createApp } from "../app";

// ─── Helpers ─────────────────────────────────────────────────────────────────

const EnvelopeSchema = z.object({
  ok: z.boolean(),
  data: z.unknown().optional(),
  error: z
    .object({
      code: z.string(),
      message: z.string(),
      correlationId: z.string(),
      recoverable: z.boolean(),
    })
    .optional(),
  meta: z.object({ correlationId: z.string(), ts: z.string() }),
});

const LEASE_TXT = "Tenant: [Tenant Name]\nRent: [Monthly Rent] per month\n";

async function withServer(
  opts: { model?: LanguageModel | null; repo?: FillRepository },
  fn: (base: string) => Promise<void>,
): Promise<void> {
  let n = 0;
  const service = createFillService({
    repo: opts.repo ?? createMemoryFillRepository(),
    blobs: createMemoryBlobStore(),
    model: opts.model ?? null,
    now: () => "2026-03-01T12:00:00.000Z",
    newId: () => `id-${++n}`,
  });
  const server = createApp(service).listen(0, "127.0.0.1");
  await once(server, "listening");
  const { port } = z.custom<AddressInfo>((v) => typeof v === "object" && v !== null).parse(server.address());
  try {
    await fn(`http://127.0.0.1:${port}`);
  } finally {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  }
}

async function call(base: string, path: string, init?: RequestInit) {
  const res = await fetch(`${base}${path}`, init);
  return { res, body: EnvelopeSchema.parse(await res.json()) };
}

function postJson(body: unknown): RequestInit {
  return { method: "POST", headers: { "content-type": "application/json" }, body: JSON.stringify(body) };
}

function upload(filename: string, text: string): RequestInit {
  return {
    method: "POST",
    headers: { "content-type": "application/octet-stream", "x-filename": filename },
    body: Buffer.from(text, "utf8"),
  };
}

// ─── A) Envelope ─────────────────────────────────────────────────────────────

test("GET /health: envelope carries the correlation id header", async () => {
  await withServer({}, async (base) => {
    const { res, body } = await call(base, "/health");
    assert.equal(res.status, 200);
    assert.equal(body.ok, true);
    assert.deepEqual(body.data, { service: "template-fill-engine" });
    assert.equal(res.headers.get("x-correlation-id"), body.meta.correlationId);
    assert.match(body.meta.correlationId, /^fill-[0-9a-z]+-[0-9a-z]+$/);
  });
});

test("incoming x-correlation-id is reused", async () => {
  await withServer({}, async (base) => {
    const { body } = await call(base, "/health", { headers: { "x-correlation-id": "req-123" } });
    assert.equal(body.meta.correlationId, "req-123");
  });
});

test("unknown route: 404 ROUTE_NOT_FOUND", async () => {
  await withServer({}, async (base) => {
    const { res, body } = await call(base, "/nowhere");
    assert.equal(res.status, 404);
    assert.equal(body.error?.code, "ROUTE_NOT_FOUND");
    assert.equal(body.error?.message, "no route for GET /nowhere");
  });
});

// ─── B) Happy path ───────────────────────────────────────────────────────────

test("upload, session, chat and render over HTTP", async () => {
  await withServer({}, async (base) => {
    const uploaded = await call(base, "/documents", upload("lease.txt", LEASE_TXT));
    assert.equal(uploaded.res.status, 201);
    const doc = z.object({ id: z.string(), format: z.string(), status: z.string() }).parse(uploaded.body.data);
    assert.deepEqual(doc, { ...doc, id: "id-1", format: "text", status: "uploaded" });

    const extracted = await call(base, `/documents/${doc.id}/extract`, { method: "POST" });
    const { placeholders } = z
      .object({ placeholders: z.array(z.object({ id: z.string() })) })
      .parse(extracted.body.data);
    assert.deepEqual(placeholders.map((p) => p.id), ["tenant_name", "monthly_rent"]);

    const created = await call(base, "/sessions", postJson({ documentId: doc.id }));
    assert.equal(created.res.status, 201);
    const { sessionId } = z.object({ sessionId: z.string() }).parse(created.body.data);

    await call(base, `/sessions/${sessionId}/chat`, postJson({ text: "Jane Doe" }));
    const done = await call(base, `/sessions/${sessionId}/chat`, postJson({ text: "$950" }));
    const turn = z.object({ phase: z.string(), progress: z.object({ filled: z.number(), total: z.number() }) });
    assert.deepEqual(turn.parse(done.body.data), { phase: "complete", progress: { filled: 2, total: 2 } });

    const final = await fetch(`${base}/sessions/${sessionId}/render`);
    assert.equal(final.status, 200);
    assert.equal(final.headers.get("content-type"), "text/plain; charset=utf-8");
    assert.equal(final.headers.get("content-disposition"), 'attachment; filename="lease-filled.txt"');
    assert.equal(await final.text(), "Tenant: Jane Doe\nRent: 950 per month\n");

    const preview = await fetch(`${base}/sessions/${sessionId}/render?mode=preview`);
    assert.equal(preview.headers.get("content-type"), "text/html; charset=utf-8");
    assert.equal(preview.headers.get("content-disposition"), 'inline; filename="lease-preview.html"');
    assert.ok((await preview.text()).includes('<p class="progress">Filled 2 of 2</p>'));
  });
});

test("render: download names keep spaces and carry a UTF-8 form", async () => {
  await withServer({}, async (base) => {
    const spaced = await call(base, "/documents", upload("my%20lease.txt", LEASE_TXT));
    const { id: spacedId } = z.object({ id: z.string() }).parse(spaced.body.data);
    const s1 = await call(base, "/sessions", postJson({ documentId: spacedId }));
    const { sessionId: first } = z.object({ sessionId: z.string() }).parse(s1.body.data);

    const plain = await fetch(`${base}/sessions/${first}/render`);
    assert.equal(plain.headers.get("content-disposition"), 'attachment; filename="my lease-filled.txt"');

    const cyrillic = await call(base, "/documents", upload(encodeURIComponent("договор.txt"), LEASE_TXT));
    const { id: cyrillicId } = z.object({ id: z.string() }).parse(cyrillic.body.data);
    const s2 = await call(base, "/sessions", postJson({ documentId: cyrillicId }));
    const { sessionId: second } = z.object({ sessionId: z.string() }).parse(s2.body.data);

    const encoded = await fetch(`${base}/sessions/${second}/render?mode=preview`);
    assert.equal(
      encoded.headers.get("content-disposition"),
      "inline; filename=\"???????-preview.html\"; filename*=UTF-8''%D0%B4%D0%BE%D0%B3%D0%BE%D0%B2%D0%BE%D1%80-preview.html",
    );
  });
});

// ─── C) Errors ───────────────────────────────────────────────────────────────

test("unknown session: 404 SESSION_NOT_FOUND", async () => {
  await withServer({}, async (base) => {
    const { res, body } = await call(base, "/sessions/nope");
    assert.equal(res.status, 404);
    assert.equal(body.ok, false);
    assert.equal(body.error?.code, "SESSION_NOT_FOUND");
    assert.equal(body.error?.message, "session not found: nope");
    assert.equal(body.error?.recoverable, false);
    assert.equal(body.error?.correlationId, body.meta.correlationId);
  });
});

test("request validation: 400 INVALID_REQUEST", async () => {
  await withServer({}, async (base) => {
    const chat = await call(base, "/sessions/s1/chat", postJson({}));
    assert.equal(chat.res.status, 400);
    assert.equal(chat.body.error?.code, "INVALID_REQUEST");
    assert.equal(chat.body.error?.message, "text: Required");

    const noName = await call(base, "/documents", { method: "POST", body: "Tenant: [Tenant Name]" });
    assert.equal(noName.res.status, 400);
    assert.equal(noName.body.error?.message, "x-filename: Required");

    const badMode = await call(base, "/sessions/s1/render?mode=pdf");
    assert.equal(badMode.res.status, 400);

    const badJson = await call(base, "/sessions", {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{not json",
    });
    assert.equal(badJson.res.status, 400);
    assert.equal(badJson.body.error?.code, "INVALID_REQUEST");
  });
});

test("unsupported upload: 422 PARSE_ERROR", async () => {
  await withServer({}, async (base) => {
    const { res, body } = await call(base, "/documents", upload("scan.pdf", "%PDF-1.7"));
    assert.equal(res.status, 422);
    assert.equal(body.error?.code, "PARSE_ERROR");
  });
});

test("model timeout: 504, recoverable", async () => {
  const model = new ScriptedModel([new ModelTimeoutError("interpret_turn", 20_000)]);
  await withServer({ model }, async (base) => {
    const uploaded = await call(base, "/documents", upload("lease.txt", LEASE_TXT));
    const { id } = z.object({ id: z.string() }).parse(uploaded.body.data);
    const created = await call(base, "/sessions", postJson({ documentId: id }));
    const { sessionId } = z.object({ sessionId: z.string() }).parse(created.body.data);

    const { res, body } = await call(base, `/sessions/${sessionId}/chat`, postJson({ text: "Jane Doe" }));
    assert.equal(res.status, 504);
    assert.equal(body.error?.code, "MODEL_TIMEOUT");
    assert.equal(body.error?.recoverable, true);
  });
});

test("unexpected failure: 500 without internals", async (t) => {
  t.mock.method(console, "error", () => {});
  const repo: FillRepository = {
    ...createMemoryFillRepository(),
    async getSession() {
      throw new Error("connection refused by db-host-7");
    },
  };
  await withServer({ repo }, async (base) => {
    const { res, body } = await call(base, "/sessions/s1");
    assert.equal(res.status, 500);
    assert.equal(body.error?.code, "INTERNAL_ERROR");
    assert.equal(body.error?.message, "An unexpected error occurred");
  });
});
