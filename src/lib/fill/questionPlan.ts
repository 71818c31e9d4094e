// src/lib/fill/questionPlan.ts
import { examplesFor } from "@/lib/fill/fieldExamples";
import type { Rejection } from "@/lib/fill/interpreter";
import type { FilledValue, PlaceholderDefinition } from "@/lib/fill/types";

export type TurnPlan =
  | { kind: "complete"; cursor: null; question: null; why: string }
  | { kind: "clarify"; cursor: string; question: string; why: string }
  | { kind: "edit"; cursor: string; question: string; why: string }
  | { kind: "ask_question"; cursor: string; question: string; why: string };

/** First placeholder in extraction order without an answer. */
export function firstUnfilled(
  definitions: readonly PlaceholderDefinition[],
  answers: Readonly<Record<string, FilledValue>>,
): PlaceholderDefinition | null {
  return definitions.find((d) => !answers[d.id]) ?? null;
}

function withExamples(def: PlaceholderDefinition): string {
  const [a, b] = examplesFor(def.kind, def.label);
  return `For example: ${a} or ${b}.`;
}

/**
 * Deterministic question per field. No model involved, so the same state
 * always asks the same thing.
 */
export function questionForField(def: PlaceholderDefinition): string {
  const label = def.label;
  switch (def.kind) {
    case "date":
      return `What date should be used for **${label}**? ${withExamples(def)}`;
    case "amount":
      return `What amount should be used for **${label}**? ${withExamples(def)}`;
    case "party-name":
      return `What is the full legal name for **${label}**? ${withExamples(def)}`;
    case "address":
      return `What is the full address for **${label}**? ${withExamples(def)}`;
    case "duration":
      return `How long is **${label}**? ${withExamples(def)}`;
    case "text":
    case "other":
      return `What should **${label}** say? ${withExamples(def)}`;
  }
}

export function clarificationFor(def: PlaceholderDefinition, rejection: Rejection): string {
  const shown = rejection.proposed.trim() ? `"${rejection.proposed.trim()}"` : "that";
  switch (rejection.reason) {
    case "invalid_date":
      return `I couldn't read ${shown} as a calendar date for **${def.label}**. ${withExamples(def)}`;
    case "invalid_amount":
      return `I couldn't read ${shown} as an amount for **${def.label}**. ${withExamples(def)}`;
    case "restates_label":
      return `I need the actual value for **${def.label}**, not the field name. ${withExamples(def)}`;
    case "empty":
      return `I didn't catch a value for **${def.label}**. ${withExamples(def)}`;
  }
}

/**
 * Pick the next focus of the conversation.
 *
 * Priority: a field whose proposed value was rejected (so the user knows
 * exactly which answer needs fixing), then a field the user asked to edit,
 * then the first unfilled field in extraction order.
 */
export function buildTurnPlan(args: {
  definitions: readonly PlaceholderDefinition[];
  answers: Readonly<Record<string, FilledValue>>;
  rejected?: readonly Rejection[];
  editTarget?: string | null;
}): TurnPlan {
  const byId = new Map(args.definitions.map((d) => [d.id, d]));

  for (const r of args.rejected ?? []) {
    const def = byId.get(r.placeholderId);
    if (!def) continue;
    return {
      kind: "clarify",
      cursor: def.id,
      question: clarificationFor(def, r),
      why: `Proposed value for ${def.id} failed validation (${r.reason}).`,
    };
  }

  const editDef = args.editTarget ? byId.get(args.editTarget) : undefined;
  if (editDef) {
    const current = args.answers[editDef.id]?.value;
    return {
      kind: "edit",
      cursor: editDef.id,
      question: current
        ? `Sure. **${editDef.label}** is currently "${current}". What should it be instead?`
        : questionForField(editDef),
      why: `User asked to change ${editDef.id}.`,
    };
  }

  const next = firstUnfilled(args.definitions, args.answers);
  if (!next) {
    return { kind: "complete", cursor: null, question: null, why: "All placeholders are filled." };
  }

  return {
    kind: "ask_question",
    cursor: next.id,
    question: questionForField(next),
    why: `Missing placeholder: ${next.id}.`,
  };
}
