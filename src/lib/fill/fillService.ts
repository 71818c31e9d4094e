/**
 * Fill Service
 *
 * The operations the HTTP layer exposes. Owns sequencing only:
 *   - extraction per document and chat turns per session run through a
 *     keyed single-writer queue
 *   - a chat turn is computed completely, then persisted with one write
 *   - render works from one session snapshot
 *
 * Dependencies are injected so tests run entirely in memory.
 */

import crypto from "node:crypto";
import path from "node:path";

import type { LanguageModel } from "@/lib/ai/provider";
import type { FillRepository } from "@/lib/db/store";
import {
  DocumentNotFoundError,
  ExtractionError,
  SessionNotFoundError,
  StoreError,
} from "@/lib/fill/errors";
import { interpretTurn } from "@/lib/fill/interpreter";
import {
  applyTurn,
  askedField,
  greet,
  newSession,
  pendingQuestion,
} from "@/lib/fill/sessionMachine";
import { KeyedQueue } from "@/lib/fill/sessionQueue";
import {
  type FillSession,
  type PlaceholderDefinition,
  type Progress,
  type RenderMode,
  type RenderedArtifact,
  type SessionPhase,
  type TemplateDocument,
  computeProgress,
  isComplete,
} from "@/lib/fill/types";
import { extractPlaceholders as runExtraction } from "@/lib/placeholders/extractPlaceholders";
import { DOCX_CONTENT_TYPE, artifactMeta, renderTemplate } from "@/lib/render/renderTemplate";
import { type BlobStore, sha256 } from "@/lib/storage/blobStore";
import { detectTemplateFormat, parseTemplate } from "@/lib/templates/parseTemplate";

export type FillServiceDeps = {
  repo: FillRepository;
  blobs: BlobStore;
  model: LanguageModel | null;
  queue?: KeyedQueue;
  now?: () => string;
  newId?: () => string;
  extractConcurrency?: number;
};

export type SessionView = {
  session: FillSession;
  progress: Progress;
  /** What the assistant is currently waiting on; null once complete. */
  question: string | null;
};

export type ChatResult = {
  assistantText: string;
  progress: Progress;
  phase: SessionPhase;
  cursor: string | null;
};

export type FillService = ReturnType<typeof createFillService>;

export function answersDigest(
  definitions: readonly PlaceholderDefinition[],
  answers: FillSession["answers"],
): string {
  return sha256(JSON.stringify(definitions.map((d) => [d.id, answers[d.id]?.value ?? null])));
}

export function createFillService(deps: FillServiceDeps) {
  const { repo, blobs, model } = deps;
  const queue = deps.queue ?? new KeyedQueue();
  const now = deps.now ?? (() => new Date().toISOString());
  const newId = deps.newId ?? (() => crypto.randomUUID());

  async function requireDocument(documentId: string): Promise<TemplateDocument> {
    const doc = await repo.getDocument(documentId);
    if (!doc) throw new DocumentNotFoundError(documentId);
    return doc;
  }

  async function requireSession(sessionId: string): Promise<FillSession> {
    const session = await repo.getSession(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  async function requireTemplateBytes(doc: TemplateDocument): Promise<Buffer> {
    const bytes = await blobs.get(doc.templateKey);
    if (!bytes) throw new StoreError(`template bytes missing for document ${doc.id}`);
    return bytes;
  }

  async function definitionsFor(documentId: string): Promise<PlaceholderDefinition[]> {
    const defs = await repo.getDefinitions(documentId);
    // Sessions only exist for extracted documents.
    if (!defs) throw new StoreError(`placeholders missing for document ${documentId}`);
    return defs;
  }

  async function uploadTemplate(filename: string, bytes: Buffer): Promise<TemplateDocument> {
    const format = detectTemplateFormat(filename, bytes);
    // Reject unreadable files at the door rather than at extraction time.
    await parseTemplate(bytes, filename, format);

    const templateHash = sha256(bytes);
    const ext = format === "docx" ? ".docx" : path.extname(filename).toLowerCase() || ".txt";
    const templateKey = `templates/${templateHash}${ext}`;
    await blobs.put(templateKey, bytes, format === "docx" ? DOCX_CONTENT_TYPE : "text/plain; charset=utf-8");

    const doc: TemplateDocument = {
      id: newId(),
      filename: path.basename(filename),
      format,
      templateKey,
      templateHash,
      status: "uploaded",
      createdAt: now(),
    };
    await repo.saveDocument(doc);

    console.log("[FillService] template uploaded", {
      documentId: doc.id,
      format,
      bytes: bytes.length,
    });
    return doc;
  }

  async function getDocument(documentId: string): Promise<TemplateDocument> {
    return requireDocument(documentId);
  }

  /** Idempotent: once a document is extracted its definitions never change. */
  function extractPlaceholders(documentId: string): Promise<PlaceholderDefinition[]> {
    return queue.run(`document:${documentId}`, async () => {
      const doc = await requireDocument(documentId);
      const existing = await repo.getDefinitions(documentId);
      if (existing) return existing;

      const bytes = await requireTemplateBytes(doc);
      const parsed = await parseTemplate(bytes, doc.filename, doc.format);

      let definitions: PlaceholderDefinition[];
      try {
        definitions = await runExtraction(parsed, {
          model,
          concurrency: deps.extractConcurrency,
        });
      } catch (err) {
        if (err instanceof ExtractionError) {
          await repo.saveDocument({ ...doc, status: "extraction_failed" });
          console.warn("[FillService] extraction found nothing", { documentId });
        }
        throw err;
      }

      await repo.saveDefinitions(documentId, definitions);
      await repo.saveDocument({ ...doc, status: "extracted" });
      return definitions;
    });
  }

  async function listPlaceholders(documentId: string): Promise<PlaceholderDefinition[]> {
    await requireDocument(documentId);
    return (await repo.getDefinitions(documentId)) ?? [];
  }

  async function createSession(
    documentId: string,
  ): Promise<{ sessionId: string; assistantText: string; progress: Progress }> {
    const definitions = await extractPlaceholders(documentId);
    const at = now();
    const { session, assistantText } = greet(
      newSession({ sessionId: newId(), documentId, now: at }),
      definitions,
      at,
    );
    await repo.saveSession(session);

    console.log("[FillService] session created", {
      sessionId: session.sessionId,
      documentId,
      placeholders: definitions.length,
    });
    return {
      sessionId: session.sessionId,
      assistantText,
      progress: computeProgress(definitions, session.answers),
    };
  }

  async function getSession(sessionId: string): Promise<SessionView> {
    const session = await requireSession(sessionId);
    const definitions = await definitionsFor(session.documentId);
    return {
      session,
      progress: computeProgress(definitions, session.answers),
      // A rejected correction reopens a session whose answers are all present.
      question: session.phase === "complete" ? null : pendingQuestion(session, definitions),
    };
  }

  /**
   * One conversational turn. Any error (model timeout included) leaves the
   * stored session exactly as it was.
   */
  function chat(sessionId: string, text: string): Promise<ChatResult> {
    return queue.run(`session:${sessionId}`, async () => {
      const session = await requireSession(sessionId);
      const definitions = await definitionsFor(session.documentId);

      const interpretation = await interpretTurn({
        definitions,
        answers: session.answers,
        log: session.conversationLog,
        userText: text,
        cursor: askedField(session, definitions),
        model,
      });

      const result = applyTurn({
        session,
        definitions,
        userText: text,
        interpretation,
        now: now(),
      });
      await repo.saveSession(result.session);

      console.log("[FillService] turn applied", {
        sessionId,
        chars: text.length,
        assigned: interpretation.assignments.length,
        rejected: interpretation.rejected.length,
        phase: result.session.phase,
        progress: result.progress,
      });

      return {
        assistantText: result.assistantText,
        progress: result.progress,
        phase: result.session.phase,
        cursor: result.session.cursor,
      };
    });
  }

  async function render(sessionId: string, mode: RenderMode): Promise<RenderedArtifact> {
    const session = await requireSession(sessionId);
    const doc = await requireDocument(session.documentId);
    const definitions = await definitionsFor(doc.id);

    const meta = artifactMeta(doc, mode);
    // Per document: the preview shows the document's own filename.
    const cacheKey = `renders/${doc.id}/${doc.templateHash}/${mode}/${answersDigest(definitions, session.answers)}`;
    const cached = await blobs.get(cacheKey);
    if (cached) return { mode, ...meta, bytes: cached };

    const artifact = await renderTemplate({
      template: { filename: doc.filename, format: doc.format, bytes: await requireTemplateBytes(doc) },
      definitions,
      answers: session.answers,
      mode,
    });
    await blobs.put(cacheKey, artifact.bytes, artifact.contentType);

    if (mode === "final" && isComplete(definitions, session.answers) && doc.status !== "filled") {
      await repo.saveDocument({ ...doc, status: "filled" });
    }

    console.log("[FillService] rendered", {
      sessionId,
      mode,
      bytes: artifact.bytes.length,
    });
    return artifact;
  }

  return {
    uploadTemplate,
    getDocument,
    extractPlaceholders,
    listPlaceholders,
    createSession,
    getSession,
    chat,
    render,
  };
}
