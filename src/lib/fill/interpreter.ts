// src/lib/fill/interpreter.ts
import { z } from "zod";

import { parseModelJson } from "@/lib/ai/modelJson";
import type { LanguageModel } from "@/lib/ai/provider";
import { FillEngineError, ModelUnavailableError } from "@/lib/fill/errors";
import { examplesFor } from "@/lib/fill/fieldExamples";
import { type NormalizeResult, normalizeValue } from "@/lib/fill/normalize";
import type {
  ConversationTurn,
  FilledValue,
  PlaceholderDefinition,
} from "@/lib/fill/types";

/** Recent turns sent to the model as conversational context. */
export const HISTORY_TURNS = 8;

/** Unvalidated (placeholder, value) pair proposed by the model. */
export type CandidateAssignment = {
  placeholderId: string;
  value: string;
  confidence: number | null;
};

export type Assignment = {
  placeholderId: string;
  value: string;
  raw: string;
  confidence: number | null;
};

export type Rejection = {
  placeholderId: string;
  proposed: string;
  reason: Extract<NormalizeResult, { ok: false }>["reason"];
};

export type Interpretation = {
  assignments: Assignment[];
  rejected: Rejection[];
  /** Field the user asked to change without giving a value yet. */
  editTarget: string | null;
};

export type InterpretArgs = {
  definitions: readonly PlaceholderDefinition[];
  answers: Readonly<Record<string, FilledValue>>;
  log: readonly ConversationTurn[];
  userText: string;
  cursor: string | null;
  model: LanguageModel | null;
};

export type Proposal = {
  candidates: CandidateAssignment[];
  editTarget: string | null;
};

const EMPTY_PROPOSAL: Proposal = { candidates: [], editTarget: null };

const CandidateSchema = z.object({
  placeholderId: z.string().min(1),
  value: z
    .union([z.string(), z.number()])
    .nullable()
    .transform((v) => (v === null ? null : String(v))),
  confidence: z.number().min(0).max(1).nullable().catch(null).default(null),
});

const ProposalSchema = z.object({
  assignments: z.array(z.unknown()).default([]),
  editTarget: z.string().nullable().catch(null).default(null),
});

const SYSTEM_PROMPT = [
  "You help fill in a legal document template through conversation.",
  "Given the list of fields, what is already filled, the recent conversation and the user's latest message,",
  "extract every field value the user's latest message supplies. The user may answer fields other than the one being asked,",
  "several fields at once, or correct an earlier answer.",
  "Only use values the user actually stated. Never invent values. Never use a field's name as its value.",
  "Return the value as the user gave it (dates and amounts are normalized later).",
  "If the user asks to change a field but gives no new value, set editTarget to that field id.",
  'Return ONLY JSON: {"assignments":[{"placeholderId":"<field id>","value":"<value>","confidence":0.0}],"editTarget":null}',
].join("\n");

function describeField(def: PlaceholderDefinition): string {
  const [a, b] = examplesFor(def.kind, def.label);
  const hint = def.hint ? ` — context: "${def.hint}"` : "";
  return `- ${def.id} (${def.kind}) "${def.label}"${hint} — e.g. ${a} / ${b}`;
}

export function buildInterpretPrompt(args: Omit<InterpretArgs, "model">): string {
  const filled = args.definitions
    .filter((d) => args.answers[d.id])
    .map((d) => `- ${d.id}: ${args.answers[d.id]?.value ?? ""}`);

  const history = args.log
    .slice(-HISTORY_TURNS)
    .map((t) => `${t.role === "user" ? "User" : "Assistant"}: ${t.text}`);

  const current = args.definitions.find((d) => d.id === args.cursor);

  return [
    "Fields:",
    ...args.definitions.map(describeField),
    "",
    "Already filled (the user may change these):",
    ...(filled.length ? filled : ["(none yet)"]),
    "",
    "Recent conversation:",
    ...(history.length ? history : ["(this is the start of the conversation)"]),
    "",
    `Field currently being asked: ${current ? `${current.id} "${current.label}"` : "(none)"}`,
    "",
    `User's latest message: ${JSON.stringify(args.userText)}`,
  ].join("\n");
}

/**
 * Model boundary: everything returned here is a hint and gets re-validated.
 * Malformed output is an empty proposal; timeouts/unavailability propagate.
 */
export async function proposeAssignments(
  model: LanguageModel,
  args: Omit<InterpretArgs, "model">,
): Promise<Proposal> {
  let text: string;
  try {
    text = await model.completeJson({
      tag: "interpret_turn",
      system: SYSTEM_PROMPT,
      user: buildInterpretPrompt(args),
      maxTokens: 600,
    });
  } catch (err) {
    if (err instanceof FillEngineError) throw err;
    throw new ModelUnavailableError("interpret_turn: model call failed", err);
  }

  const parsed = parseModelJson(text, ProposalSchema);
  if (!parsed) {
    console.warn("[Interpreter] model output unparseable; no assignment this turn", {
      chars: text.length,
    });
    return EMPTY_PROPOSAL;
  }

  const candidates: CandidateAssignment[] = [];
  for (const raw of parsed.assignments) {
    const item = CandidateSchema.safeParse(raw);
    if (!item.success || item.data.value === null) continue;
    candidates.push({
      placeholderId: item.data.placeholderId,
      value: item.data.value,
      confidence: item.data.confidence,
    });
  }
  return { candidates, editTarget: parsed.editTarget };
}

/** No model configured: the whole message answers the field being asked, if any. */
export function fallbackProposal(args: Pick<InterpretArgs, "cursor" | "userText">): Proposal {
  if (!args.cursor) return EMPTY_PROPOSAL;
  return {
    candidates: [{ placeholderId: args.cursor, value: args.userText, confidence: null }],
    editTarget: null,
  };
}

/**
 * Deterministic gate over a proposal: unknown ids dropped, last candidate
 * per field wins, every value normalized by kind. Invalid values become
 * rejections, never errors.
 */
export function validateProposal(
  definitions: readonly PlaceholderDefinition[],
  proposal: Proposal,
  userText: string,
): Interpretation {
  const byId = new Map(definitions.map((d) => [d.id, d]));

  const latest = new Map<string, CandidateAssignment>();
  for (const c of proposal.candidates) {
    if (!byId.has(c.placeholderId)) continue;
    latest.delete(c.placeholderId);
    latest.set(c.placeholderId, c);
  }

  const assignments: Assignment[] = [];
  const rejected: Rejection[] = [];
  for (const c of latest.values()) {
    const def = byId.get(c.placeholderId);
    if (!def) continue;

    const result = normalizeValue(def, c.value);
    if (result.ok) {
      assignments.push({
        placeholderId: def.id,
        value: result.value,
        raw: userText,
        confidence: c.confidence,
      });
    } else {
      rejected.push({ placeholderId: def.id, proposed: c.value, reason: result.reason });
    }
  }

  const editTarget =
    proposal.editTarget && byId.has(proposal.editTarget) && !latest.has(proposal.editTarget)
      ? proposal.editTarget
      : null;

  return { assignments, rejected, editTarget };
}

export async function interpretTurn(args: InterpretArgs): Promise<Interpretation> {
  const { model, ...context } = args;
  const proposal = model ? await proposeAssignments(model, context) : fallbackProposal(context);
  return validateProposal(args.definitions, proposal, args.userText);
}
