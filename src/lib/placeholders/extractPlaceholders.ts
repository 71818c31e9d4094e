// src/lib/placeholders/extractPlaceholders.ts
import type { LanguageModel } from "@/lib/ai/provider";
import { ExtractionError } from "@/lib/fill/errors";
import type { Anchor, PlaceholderDefinition, PlaceholderKind } from "@/lib/fill/types";
import { type Classification, classifyAmbiguous } from "@/lib/placeholders/classify";
import { type CandidateSpan, detectCandidates } from "@/lib/placeholders/patterns";
import type { ParsedTemplate } from "@/lib/templates/parseTemplate";

/** Identity of a semantic field: label, case-insensitive, whitespace-collapsed. */
export function dedupKey(label: string): string {
  return label.replace(/\s+/g, " ").trim().toLowerCase();
}

export function slugifyLabel(label: string): string {
  const slug = dedupKey(label)
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  if (!slug) return "field";
  return /^[0-9]/.test(slug) ? `field_${slug}` : slug;
}

type Group = {
  label: string;
  kind: PlaceholderKind;
  hint: string | null;
  source: "pattern" | "model";
  anchors: Anchor[];
};

function toAnchor(c: CandidateSpan): Anchor {
  return { blockIndex: c.blockIndex, start: c.start, end: c.end, excerpt: c.excerpt };
}

/**
 * Merge labelled candidates into definitions. Recurring fields become one
 * definition with several anchors; order follows first occurrence, and ids
 * are derived from the label so identical input yields identical ids.
 */
export function mergeCandidates(
  labelled: Array<{ candidate: CandidateSpan; classification: Classification }>,
): PlaceholderDefinition[] {
  const groups = new Map<string, Group>();

  for (const { candidate, classification } of labelled) {
    const key = dedupKey(classification.label);
    const existing = groups.get(key);
    if (existing) {
      existing.anchors.push(toAnchor(candidate));
      continue;
    }
    groups.set(key, {
      label: classification.label.replace(/\s+/g, " ").trim(),
      kind: classification.kind,
      hint: candidate.hint,
      source: classification.source,
      anchors: [toAnchor(candidate)],
    });
  }

  const usedIds = new Set<string>();
  const out: PlaceholderDefinition[] = [];
  for (const g of groups.values()) {
    const base = slugifyLabel(g.label);
    let id = base;
    for (let n = 2; usedIds.has(id); n++) id = `${base}_${n}`;
    usedIds.add(id);

    out.push({
      id,
      label: g.label,
      kind: g.kind,
      anchors: g.anchors,
      required: true,
      hint: g.hint,
      source: g.source,
    });
  }
  return out;
}

export type ExtractOptions = {
  model?: LanguageModel | null;
  concurrency?: number;
};

/**
 * Deterministic pattern layer first, model-assisted classification for the
 * ambiguous remainder, then merge by label.
 *
 * Throws ExtractionError when nothing fillable is found.
 */
export async function extractPlaceholders(
  template: ParsedTemplate,
  opts: ExtractOptions = {},
): Promise<PlaceholderDefinition[]> {
  const candidates = detectCandidates(template.blocks);
  if (candidates.length === 0) {
    throw new ExtractionError("no placeholders detected in template");
  }

  const ambiguous = candidates.filter((c) => c.label === null);
  const classified = await classifyAmbiguous({
    blocks: template.blocks,
    candidates: ambiguous,
    model: opts.model ?? null,
    concurrency: opts.concurrency,
  });
  const byCandidate = new Map<CandidateSpan, Classification | null>();
  ambiguous.forEach((c, i) => byCandidate.set(c, classified[i] ?? null));

  const labelled: Array<{ candidate: CandidateSpan; classification: Classification }> = [];
  for (const candidate of candidates) {
    if (candidate.label !== null) {
      labelled.push({
        candidate,
        classification: {
          label: candidate.label,
          kind: candidate.kind ?? "text",
          source: "pattern",
        },
      });
      continue;
    }
    const classification = byCandidate.get(candidate);
    if (classification) labelled.push({ candidate, classification });
  }

  const definitions = mergeCandidates(labelled);
  if (definitions.length === 0) {
    throw new ExtractionError("no placeholders detected in template");
  }

  console.log("[Extractor] placeholders extracted", {
    candidates: candidates.length,
    ambiguous: ambiguous.length,
    definitions: definitions.length,
    anchors: definitions.reduce((n, d) => n + d.anchors.length, 0),
  });

  return definitions;
}
