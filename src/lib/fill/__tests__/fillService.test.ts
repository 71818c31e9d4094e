import test from "node:test";
import assert from "node:assert/strict";

import type { LanguageModel } from "@/lib/ai/provider";
import { createMemoryFillRepository } from "@/lib/db/store";
import {
  DocumentNotFoundError,
  ExtractionError,
  ModelTimeoutError,
  ParseError,
  SessionNotFoundError,
} from "@/lib/fill/errors";
import { type BlobStore, createMemoryBlobStore } from "@/lib/storage/blobStore";
import { ScriptedModel, buildDocx, docxParagraphTexts } from "@/lib/testing/fakes";
import { createFillService } from "../fillService";

const NOW = "2026-03-01T12:00:00.000Z";

function setup(model: LanguageModel | null = null) {
  const repo = createMemoryFillRepository();
  const puts: string[] = [];
  const memory = createMemoryBlobStore();
  const blobs: BlobStore = {
    async put(key, bytes, contentType) {
      puts.push(key);
      await memory.put(key, bytes, contentType);
    },
    get: (key) => memory.get(key),
  };
  let n = 0;
  const service = createFillService({
    repo,
    blobs,
    model,
    now: () => NOW,
    newId: () => `id-${++n}`,
  });
  return { service, repo, puts };
}

const LEASE_TXT = Buffer.from("Tenant: [Tenant Name]\nRent: [Monthly Rent] per month\nSigned: [Tenant Name]\n");

test("fill service: upload, converse, render a completed docx", async () => {
  const model = new ScriptedModel([
    JSON.stringify({
      assignments: [
        { placeholderId: "tenant_name", value: "Jane Doe" },
        { placeholderId: "monthly_rent", value: "$1,500" },
      ],
    }),
  ]);
  const { service, repo } = setup(model);

  const docx = await buildDocx([["Tenant: ", "[Tenant Name]", " agrees."], "Rent: [Monthly Rent] per month"]);
  const doc = await service.uploadTemplate("lease.docx", docx);
  assert.equal(doc.id, "id-1");
  assert.equal(doc.format, "docx");
  assert.equal(doc.status, "uploaded");

  const created = await service.createSession(doc.id);
  assert.equal(created.sessionId, "id-2");
  assert.deepEqual(created.progress, { filled: 0, total: 2 });
  assert.equal(
    created.assistantText,
    "Hi! I'll help you fill in this document. There are 2 fields to complete, and you can answer several at once. " +
      "What is the full legal name for **Tenant Name**? For example: Jane Doe or TechStart Inc.",
  );

  const reply = await service.chat(created.sessionId, "The tenant is Jane Doe and rent is $1,500 a month");
  assert.equal(reply.phase, "complete");
  assert.equal(reply.cursor, null);
  assert.deepEqual(reply.progress, { filled: 2, total: 2 });
  assert.equal(
    reply.assistantText,
    "Got it — **Tenant Name**: Jane Doe; **Monthly Rent**: 1500. All 2 fields are filled. " +
      "You can download the completed document now, or tell me anything you'd like to change.",
  );
  assert.ok(model.calls[0]?.user.includes('Field currently being asked: tenant_name "Tenant Name"'));

  const view = await service.getSession(created.sessionId);
  assert.equal(view.question, null);
  assert.equal(view.session.conversationLog.length, 3);
  assert.equal(view.session.completedAt, NOW);

  const out = await service.render(created.sessionId, "final");
  assert.equal(out.filename, "lease-filled.docx");
  assert.deepEqual(await docxParagraphTexts(out.bytes), ["Tenant: Jane Doe agrees.", "Rent: 1500 per month"]);
  assert.equal((await repo.getDocument(doc.id))?.status, "filled");
});

test("fill service: model timeout leaves the session untouched", async () => {
  const model = new ScriptedModel([new ModelTimeoutError("interpret_turn", 20_000)]);
  const { service } = setup(model);
  const doc = await service.uploadTemplate("lease.txt", LEASE_TXT);
  const { sessionId } = await service.createSession(doc.id);
  const before = await service.getSession(sessionId);

  await assert.rejects(() => service.chat(sessionId, "Jane Doe"), ModelTimeoutError);

  assert.deepEqual(await service.getSession(sessionId), before);
});

test("fill service: an unreadable date is not recorded", async () => {
  const { service } = setup();
  const doc = await service.uploadTemplate("notice.txt", Buffer.from("Effective: [Start Date]"));
  const { sessionId } = await service.createSession(doc.id);

  const reply = await service.chat(sessionId, "banana");
  assert.deepEqual(reply.progress, { filled: 0, total: 1 });
  assert.equal(reply.phase, "asking");
  assert.equal(reply.cursor, "start_date");
  assert.equal(
    reply.assistantText,
    'I couldn\'t read "banana" as a calendar date for **Start Date**. For example: January 15, 2025 or 12/31/2025.',
  );
  assert.deepEqual((await service.getSession(sessionId)).session.answers, {});
});

test("fill service: without a model each message answers the asked field", async () => {
  const { service } = setup();
  const doc = await service.uploadTemplate("lease.txt", LEASE_TXT);
  const { sessionId } = await service.createSession(doc.id);

  await service.chat(sessionId, "Jane Doe");
  const second = await service.chat(sessionId, "1,200.00");
  assert.equal(second.phase, "complete");

  const out = await service.render(sessionId, "final");
  assert.equal(out.filename, "lease-filled.txt");
  assert.equal(out.bytes.toString("utf8"), "Tenant: Jane Doe\nRent: 1200 per month\nSigned: Jane Doe\n");
});

test("fill service: unknown ids are not-found errors", async () => {
  const { service } = setup();
  await assert.rejects(() => service.getDocument("nope"), DocumentNotFoundError);
  await assert.rejects(() => service.createSession("nope"), DocumentNotFoundError);
  await assert.rejects(() => service.listPlaceholders("nope"), DocumentNotFoundError);
  await assert.rejects(() => service.getSession("nope"), SessionNotFoundError);
  await assert.rejects(() => service.chat("nope", "hi"), SessionNotFoundError);
  await assert.rejects(() => service.render("nope", "final"), SessionNotFoundError);
});

test("fill service: unsupported or empty uploads are rejected", async () => {
  const { service } = setup();
  await assert.rejects(
    () => service.uploadTemplate("contract.pdf", Buffer.from("%PDF-1.7")),
    (err: unknown) => err instanceof ParseError && err.message === "unsupported template type: .pdf",
  );
  await assert.rejects(() => service.uploadTemplate("empty.txt", Buffer.alloc(0)), ParseError);
});

test("fill service: extraction runs once per document", async () => {
  const { service } = setup();
  const doc = await service.uploadTemplate("lease.txt", LEASE_TXT);
  assert.deepEqual(await service.listPlaceholders(doc.id), []);

  const [a, b] = await Promise.all([service.extractPlaceholders(doc.id), service.extractPlaceholders(doc.id)]);
  assert.deepEqual(a, b);
  assert.deepEqual(
    a.map((d) => [d.id, d.kind, d.anchors.length]),
    [
      ["tenant_name", "party-name", 2],
      ["monthly_rent", "amount", 1],
    ],
  );
  assert.deepEqual(await service.listPlaceholders(doc.id), a);
  assert.equal((await service.getDocument(doc.id)).status, "extracted");
});

test("fill service: a template without placeholders fails extraction", async () => {
  const { service, repo } = setup();
  const doc = await service.uploadTemplate("memo.txt", Buffer.from("Nothing to fill in here."));
  await assert.rejects(() => service.createSession(doc.id), ExtractionError);
  assert.equal((await repo.getDocument(doc.id))?.status, "extraction_failed");
});

test("fill service: renders are cached per answer state", async () => {
  const { service, puts } = setup();
  const doc = await service.uploadTemplate("lease.txt", LEASE_TXT);
  const { sessionId } = await service.createSession(doc.id);

  const first = await service.render(sessionId, "preview");
  const second = await service.render(sessionId, "preview");
  assert.ok(second.bytes.equals(first.bytes));
  assert.equal(second.filename, "lease-preview.html");
  assert.equal(second.contentType, "text/html; charset=utf-8");
  assert.equal(puts.filter((k) => k.startsWith("renders/")).length, 1);

  await service.chat(sessionId, "Jane Doe");
  const third = await service.render(sessionId, "preview");
  assert.ok(!third.bytes.equals(first.bytes));
  assert.equal(puts.filter((k) => k.startsWith("renders/")).length, 2);
});

test("fill service: identical bytes under two names never share a preview", async () => {
  const { service } = setup();
  const acme = await service.uploadTemplate("acme-lease.txt", LEASE_TXT);
  const globex = await service.uploadTemplate("globex-lease.txt", LEASE_TXT);
  assert.equal(acme.templateHash, globex.templateHash);

  const acmeSession = await service.createSession(acme.id);
  const globexSession = await service.createSession(globex.id);

  const acmePreview = (await service.render(acmeSession.sessionId, "preview")).bytes.toString("utf8");
  const globexPreview = (await service.render(globexSession.sessionId, "preview")).bytes.toString("utf8");

  assert.ok(acmePreview.includes("<h1>acme-lease.txt</h1>"));
  assert.ok(globexPreview.includes("<h1>globex-lease.txt</h1>"));
  assert.ok(!globexPreview.includes("acme-lease.txt"));
});

test("fill service: rejected correction after completion reopens the question", async () => {
  const model = new ScriptedModel([
    '{"assignments":[{"placeholderId":"start_date","value":"03/01/2026"}]}',
    '{"assignments":[{"placeholderId":"start_date","value":"banana"}]}',
  ]);
  const { service } = setup(model);
  const doc = await service.uploadTemplate("notice.txt", Buffer.from("Effective: [Start Date]"));
  const { sessionId } = await service.createSession(doc.id);

  const done = await service.chat(sessionId, "it starts 03/01/2026");
  assert.equal(done.phase, "complete");
  assert.equal((await service.getSession(sessionId)).question, null);

  const reply = await service.chat(sessionId, "actually make it banana");
  assert.equal(reply.phase, "asking");
  assert.equal(reply.cursor, "start_date");

  const view = await service.getSession(sessionId);
  assert.equal(view.session.phase, "asking");
  assert.equal(view.session.answers.start_date?.value, "March 1, 2026");
  assert.deepEqual(view.progress, { filled: 1, total: 1 });
  assert.equal(view.question, 'Sure. **Start Date** is currently "March 1, 2026". What should it be instead?');
});

test("fill service: concurrent turns on one session run one after the other", async () => {
  let open: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    open = resolve;
  });
  let started: () => void = () => {};
  const firstStarted = new Promise<void>((resolve) => {
    started = resolve;
  });

  const model = new ScriptedModel([
    async () => {
      started();
      await gate;
      return '{"assignments":[{"placeholderId":"tenant_name","value":"Jane Doe"}]}';
    },
    '{"assignments":[{"placeholderId":"monthly_rent","value":"1200"}]}',
  ]);
  const { service } = setup(model);
  const doc = await service.uploadTemplate("lease.txt", LEASE_TXT);
  const { sessionId } = await service.createSession(doc.id);

  const turns = Promise.all([
    service.chat(sessionId, "tenant is Jane Doe"),
    service.chat(sessionId, "rent is 1200"),
  ]);

  await firstStarted;
  await new Promise((resolve) => setTimeout(resolve, 20));
  assert.equal(model.calls.length, 1);

  open();
  const [first, second] = await turns;
  assert.deepEqual(first.progress, { filled: 1, total: 2 });
  assert.deepEqual(second.progress, { filled: 2, total: 2 });
  assert.ok(model.calls[1]?.user.includes("- tenant_name: Jane Doe"));

  const { session } = await service.getSession(sessionId);
  assert.deepEqual(
    session.conversationLog.slice(1).map((t) => [t.role, t.text]),
    [
      ["user", "tenant is Jane Doe"],
      ["assistant", first.assistantText],
      ["user", "rent is 1200"],
      ["assistant", second.assistantText],
    ],
  );
  assert.equal(session.conversationLog.length, 5);
});
