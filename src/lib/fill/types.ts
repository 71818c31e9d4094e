// src/lib/fill/types.ts

export const PLACEHOLDER_KINDS = [
  "text",
  "date",
  "amount",
  "address",
  "party-name",
  "duration",
  "other",
] as const;

export type PlaceholderKind = (typeof PLACEHOLDER_KINDS)[number];

/** One located occurrence of a placeholder inside the template. */
export type Anchor = {
  blockIndex: number;
  /** Inclusive start offset within the block text. */
  start: number;
  /** Exclusive end offset within the block text. */
  end: number;
  /** Exact template text covered by [start, end). */
  excerpt: string;
};

export type PlaceholderDefinition = {
  id: string;
  label: string;
  kind: PlaceholderKind;
  anchors: Anchor[];
  required: true;
  hint: string | null;
  source: "pattern" | "model";
};

export type TemplateFormat = "docx" | "text";

export type DocumentStatus = "uploaded" | "extracted" | "extraction_failed" | "filled";

export type TemplateDocument = {
  id: string;
  filename: string;
  format: TemplateFormat;
  templateKey: string;
  templateHash: string;
  status: DocumentStatus;
  createdAt: string;
};

export type FilledValue = {
  value: string;
  raw: string;
  confidence: number | null;
  filledAt: string;
};

export type ConversationTurn = {
  role: "user" | "assistant";
  text: string;
  at: string;
};

export type SessionPhase = "created" | "asking" | "idle" | "complete";

export type FillSession = {
  sessionId: string;
  documentId: string;
  answers: Record<string, FilledValue>;
  conversationLog: ConversationTurn[];
  cursor: string | null;
  phase: SessionPhase;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
};

export type Progress = {
  filled: number;
  total: number;
};

export type RenderMode = "final" | "preview";

export type RenderedArtifact = {
  mode: RenderMode;
  filename: string;
  contentType: string;
  bytes: Buffer;
};

export function computeProgress(
  definitions: readonly PlaceholderDefinition[],
  answers: Record<string, FilledValue>,
): Progress {
  let filled = 0;
  for (const def of definitions) {
    if (answers[def.id]) filled++;
  }
  return { filled, total: definitions.length };
}

export function isComplete(
  definitions: readonly PlaceholderDefinition[],
  answers: Record<string, FilledValue>,
): boolean {
  const { filled, total } = computeProgress(definitions, answers);
  return total > 0 && filled === total;
}
