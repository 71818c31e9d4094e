// src/lib/db/store.ts
import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";

import { StoreError } from "@/lib/fill/errors";
import {
  type FillSession,
  PLACEHOLDER_KINDS,
  type PlaceholderDefinition,
  type TemplateDocument,
} from "@/lib/fill/types";

/**
 * Persistence seam for documents, extracted definitions and sessions.
 * A session is always written whole, so a reader sees either the previous
 * turn or the new one, never a mix.
 */
export interface FillRepository {
  saveDocument(doc: TemplateDocument): Promise<void>;
  getDocument(documentId: string): Promise<TemplateDocument | null>;
  /** Replaces every definition of the document. */
  saveDefinitions(documentId: string, definitions: PlaceholderDefinition[]): Promise<void>;
  /** Null until the document has been extracted. */
  getDefinitions(documentId: string): Promise<PlaceholderDefinition[] | null>;
  saveSession(session: FillSession): Promise<void>;
  getSession(sessionId: string): Promise<FillSession | null>;
}

// ---------------------------------------------------------------------------
// In-memory (dev, tests)
// ---------------------------------------------------------------------------

export function createMemoryFillRepository(): FillRepository {
  const documents = new Map<string, TemplateDocument>();
  const definitions = new Map<string, PlaceholderDefinition[]>();
  const sessions = new Map<string, FillSession>();

  // Clone both ways so callers can never mutate stored state in place.
  const read = <T>(v: T | undefined): T | null => (v === undefined ? null : structuredClone(v));

  return {
    async saveDocument(doc) {
      documents.set(doc.id, structuredClone(doc));
    },
    async getDocument(documentId) {
      return read(documents.get(documentId));
    },
    async saveDefinitions(documentId, defs) {
      definitions.set(documentId, structuredClone(defs));
    },
    async getDefinitions(documentId) {
      return read(definitions.get(documentId));
    },
    async saveSession(session) {
      sessions.set(session.sessionId, structuredClone(session));
    },
    async getSession(sessionId) {
      return read(sessions.get(sessionId));
    },
  };
}

// ---------------------------------------------------------------------------
// Supabase (tables in supabase/migrations/0001_fill_engine.sql)
// ---------------------------------------------------------------------------

const AnchorSchema = z.object({
  blockIndex: z.number().int().nonnegative(),
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
  excerpt: z.string(),
});

const DocumentRowSchema = z.object({
  id: z.string(),
  filename: z.string(),
  format: z.enum(["docx", "text"]),
  template_key: z.string(),
  template_hash: z.string(),
  status: z.enum(["uploaded", "extracted", "extraction_failed", "filled"]),
  created_at: z.string(),
});

const PlaceholderRowSchema = z.object({
  document_id: z.string(),
  position: z.number().int(),
  placeholder_id: z.string(),
  label: z.string(),
  kind: z.enum(PLACEHOLDER_KINDS),
  anchors: z.array(AnchorSchema),
  hint: z.string().nullable(),
  source: z.enum(["pattern", "model"]),
});

const SessionRowSchema = z.object({
  session_id: z.string(),
  document_id: z.string(),
  answers: z.record(
    z.object({
      value: z.string(),
      raw: z.string(),
      confidence: z.number().nullable(),
      filledAt: z.string(),
    }),
  ),
  conversation_log: z.array(
    z.object({ role: z.enum(["user", "assistant"]), text: z.string(), at: z.string() }),
  ),
  cursor: z.string().nullable(),
  phase: z.enum(["created", "asking", "idle", "complete"]),
  created_at: z.string(),
  updated_at: z.string(),
  completed_at: z.string().nullable(),
});

type DocumentRow = z.infer<typeof DocumentRowSchema>;
type PlaceholderRow = z.infer<typeof PlaceholderRowSchema>;
type SessionRow = z.infer<typeof SessionRowSchema>;

function parseRow<T>(schema: z.ZodType<T>, table: string, row: unknown): T {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    throw new StoreError(`${table}: malformed row (${parsed.error.issues[0]?.message ?? "invalid"})`);
  }
  return parsed.data;
}

function fail(op: string, error: { message: string }): never {
  console.error("[FillRepository] supabase error", { op, message: error.message });
  throw new StoreError(`${op} failed: ${error.message}`, error);
}

export function createSupabaseFillRepository(sb: SupabaseClient): FillRepository {
  return {
    async saveDocument(doc) {
      const row: DocumentRow = {
        id: doc.id,
        filename: doc.filename,
        format: doc.format,
        template_key: doc.templateKey,
        template_hash: doc.templateHash,
        status: doc.status,
        created_at: doc.createdAt,
      };
      const { error } = await sb.from("fill_documents").upsert(row, { onConflict: "id" });
      if (error) fail("saveDocument", error);
    },

    async getDocument(documentId) {
      const { data, error } = await sb
        .from("fill_documents")
        .select("*")
        .eq("id", documentId)
        .maybeSingle();
      if (error) fail("getDocument", error);
      if (!data) return null;
      const row = parseRow(DocumentRowSchema, "fill_documents", data);
      return {
        id: row.id,
        filename: row.filename,
        format: row.format,
        templateKey: row.template_key,
        templateHash: row.template_hash,
        status: row.status,
        createdAt: row.created_at,
      };
    },

    async saveDefinitions(documentId, defs) {
      const del = await sb.from("fill_placeholders").delete().eq("document_id", documentId);
      if (del.error) fail("saveDefinitions.delete", del.error);
      if (defs.length === 0) return;

      const rows: PlaceholderRow[] = defs.map((d, position) => ({
        document_id: documentId,
        position,
        placeholder_id: d.id,
        label: d.label,
        kind: d.kind,
        anchors: d.anchors,
        hint: d.hint,
        source: d.source,
      }));
      const { error } = await sb.from("fill_placeholders").insert(rows);
      if (error) fail("saveDefinitions.insert", error);
    },

    async getDefinitions(documentId) {
      const { data, error } = await sb
        .from("fill_placeholders")
        .select("*")
        .eq("document_id", documentId)
        .order("position", { ascending: true });
      if (error) fail("getDefinitions", error);
      if (!data || data.length === 0) return null;

      return data.map((raw: unknown): PlaceholderDefinition => {
        const row = parseRow(PlaceholderRowSchema, "fill_placeholders", raw);
        return {
          id: row.placeholder_id,
          label: row.label,
          kind: row.kind,
          anchors: row.anchors,
          required: true,
          hint: row.hint,
          source: row.source,
        };
      });
    },

    async saveSession(session) {
      const row: SessionRow = {
        session_id: session.sessionId,
        document_id: session.documentId,
        answers: session.answers,
        conversation_log: session.conversationLog,
        cursor: session.cursor,
        phase: session.phase,
        created_at: session.createdAt,
        updated_at: session.updatedAt,
        completed_at: session.completedAt,
      };
      const { error } = await sb.from("fill_sessions").upsert(row, { onConflict: "session_id" });
      if (error) fail("saveSession", error);
    },

    async getSession(sessionId) {
      const { data, error } = await sb
        .from("fill_sessions")
        .select("*")
        .eq("session_id", sessionId)
        .maybeSingle();
      if (error) fail("getSession", error);
      if (!data) return null;
      const row = parseRow(SessionRowSchema, "fill_sessions", data);
      return {
        sessionId: row.session_id,
        documentId: row.document_id,
        answers: row.answers,
        conversationLog: row.conversation_log,
        cursor: row.cursor,
        phase: row.phase,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
        completedAt: row.completed_at,
      };
    },
  };
}
