// src/lib/placeholders/classify.ts
import pLimit from "p-limit";
import { z } from "zod";

import { parseModelJson } from "@/lib/ai/modelJson";
import type { LanguageModel } from "@/lib/ai/provider";
import { PLACEHOLDER_KINDS, type PlaceholderKind } from "@/lib/fill/types";
import {
  type CandidateSpan,
  inferKindFromLabel,
  labelFromPrecedingText,
} from "@/lib/placeholders/patterns";
import type { TextBlock } from "@/lib/templates/parseTemplate";

/** Model context is capped; the candidates carry their own local context anyway. */
export const MAX_DOCUMENT_CHARS = 15_000;
const BATCH_SIZE = 25;
const CONTEXT_RADIUS = 120;

export type Classification = {
  label: string;
  kind: PlaceholderKind;
  source: "pattern" | "model";
};

const ClassificationItemSchema = z.object({
  ref: z.string(),
  label: z.string().trim().min(1).max(80),
  kind: z.enum(PLACEHOLDER_KINDS).catch("other"),
  isPlaceholder: z.boolean().default(true),
});

const ClassificationResponseSchema = z.object({
  fields: z.array(z.unknown()).default([]),
});

const SYSTEM_PROMPT = [
  "You classify blanks in a legal document template.",
  "Each item is a blank, marker or mask that a user must fill in, shown with its surrounding text.",
  "For each item give a short human-readable label for the value (e.g. \"Tenant Full Name\", \"Monthly Rent\") and a kind.",
  `kind is one of: ${PLACEHOLDER_KINDS.join(", ")}.`,
  "Blanks that clearly refer to the same value must get exactly the same label.",
  "Set isPlaceholder to false only for decorative lines that are not meant to be filled.",
  'Return ONLY JSON: {"fields":[{"ref":"c0","label":"...","kind":"text","isPlaceholder":true}]}',
].join("\n");

function contextFor(block: TextBlock | undefined, c: CandidateSpan): string {
  if (!block) return c.excerpt;
  const before = block.text.slice(Math.max(0, c.start - CONTEXT_RADIUS), c.start);
  const after = block.text.slice(c.end, c.end + CONTEXT_RADIUS);
  return `${before}⟦${c.excerpt}⟧${after}`;
}

export function documentExcerpt(blocks: readonly TextBlock[]): string {
  return blocks
    .map((b) => b.text)
    .filter((t) => t.trim().length > 0)
    .join("\n\n")
    .slice(0, MAX_DOCUMENT_CHARS);
}

/** Deterministic label/kind for an ambiguous span. */
export function heuristicClassification(
  block: TextBlock | undefined,
  c: CandidateSpan,
  blankNumber: number,
): Classification {
  const label = (block && labelFromPrecedingText(block.text, c.start)) || `Blank ${blankNumber}`;
  return { label, kind: c.kind ?? inferKindFromLabel(label), source: "pattern" };
}

async function classifyBatch(
  model: LanguageModel,
  excerpt: string,
  items: Array<{ ref: string; context: string; kindHint: PlaceholderKind | null }>,
): Promise<Map<string, z.infer<typeof ClassificationItemSchema>>> {
  const user = [
    "Document (may be truncated):",
    excerpt,
    "",
    "Items (the blank is between ⟦ and ⟧):",
    ...items.map(
      (it) => `- ref=${it.ref}${it.kindHint ? ` (looks like: ${it.kindHint})` : ""}: ${it.context}`,
    ),
  ].join("\n");

  const text = await model.completeJson({
    tag: "classify_placeholders",
    system: SYSTEM_PROMPT,
    user,
    maxTokens: 1200,
  });

  const out = new Map<string, z.infer<typeof ClassificationItemSchema>>();
  const parsed = parseModelJson(text, ClassificationResponseSchema);
  if (!parsed) {
    console.warn("[Extractor] classification output unparseable; using heuristic labels", {
      items: items.length,
      chars: text.length,
    });
    return out;
  }

  for (const raw of parsed.fields) {
    const item = ClassificationItemSchema.safeParse(raw);
    if (item.success) out.set(item.data.ref, item.data);
  }
  return out;
}

/**
 * Model-assisted pass over ambiguous spans. Returns one entry per input
 * candidate (same order): a classification, or null when the model says the
 * span is not a placeholder. Malformed output falls back to heuristics;
 * model timeout / unavailability propagates.
 */
export async function classifyAmbiguous(args: {
  blocks: readonly TextBlock[];
  candidates: readonly CandidateSpan[];
  model: LanguageModel | null;
  concurrency?: number;
}): Promise<Array<Classification | null>> {
  const { blocks, candidates, model } = args;
  const blockAt = (i: number) => blocks.find((b) => b.index === i);

  const fallback = candidates.map((c, i) => heuristicClassification(blockAt(c.blockIndex), c, i + 1));
  if (!model || candidates.length === 0) return fallback;

  const excerpt = documentExcerpt(blocks);
  const items = candidates.map((c, i) => ({
    ref: `c${i}`,
    context: contextFor(blockAt(c.blockIndex), c),
    kindHint: c.kind,
  }));

  const batches: Array<typeof items> = [];
  for (let i = 0; i < items.length; i += BATCH_SIZE) batches.push(items.slice(i, i + BATCH_SIZE));

  const limit = pLimit(args.concurrency ?? 4);
  const results = await Promise.all(batches.map((b) => limit(() => classifyBatch(model, excerpt, b))));

  const merged = new Map<string, z.infer<typeof ClassificationItemSchema>>();
  for (const r of results) for (const [k, v] of r) merged.set(k, v);

  return candidates.map((c, i) => {
    const proposed = merged.get(`c${i}`);
    const base = fallback[i] ?? heuristicClassification(undefined, c, i + 1);
    if (!proposed) return base;
    if (!proposed.isPlaceholder) return null;
    return {
      label: proposed.label,
      // Pattern-implied kinds (money blank, date mask) beat the model's guess.
      kind: c.kind ?? proposed.kind,
      source: "model",
    };
  });
}
