/**
 * Fill Session State Machine
 *
 *   created → asking(cursor) → asking(next) → … → complete
 *                  ↕
 *                idle   (turn supplied nothing usable; same question again)
 *
 * `complete` is not absorbing: a later correction can move the session back
 * to `asking`. Every transition here is a pure function of
 * (session, definitions, interpretation) so a turn can be computed fully
 * before anything is persisted.
 */

import type { Interpretation } from "@/lib/fill/interpreter";
import {
  type TurnPlan,
  buildTurnPlan,
  firstUnfilled,
  questionForField,
} from "@/lib/fill/questionPlan";
import {
  type FillSession,
  type PlaceholderDefinition,
  type Progress,
  type SessionPhase,
  computeProgress,
} from "@/lib/fill/types";

export function newSession(args: {
  sessionId: string;
  documentId: string;
  now: string;
}): FillSession {
  return {
    sessionId: args.sessionId,
    documentId: args.documentId,
    answers: {},
    conversationLog: [],
    cursor: null,
    phase: "created",
    createdAt: args.now,
    updatedAt: args.now,
    completedAt: null,
  };
}

/**
 * Field the last assistant turn asked about. Before the first user turn the
 * cursor is still empty, but the greeting already asked for the first field.
 */
export function askedField(
  session: FillSession,
  definitions: readonly PlaceholderDefinition[],
): string | null {
  if (session.cursor) return session.cursor;
  if (session.conversationLog.length === 0) return null;
  return firstUnfilled(definitions, session.answers)?.id ?? null;
}

/** Question the assistant is waiting on, recomputed from state. */
export function pendingQuestion(
  session: FillSession,
  definitions: readonly PlaceholderDefinition[],
): string | null {
  const asked = askedField(session, definitions);
  const def = definitions.find((d) => d.id === asked);
  if (!def) return buildTurnPlan({ definitions, answers: session.answers }).question;
  const current = session.answers[def.id];
  return current
    ? `Sure. **${def.label}** is currently "${current.value}". What should it be instead?`
    : questionForField(def);
}

export function openingMessage(definitions: readonly PlaceholderDefinition[]): string {
  const plan = buildTurnPlan({ definitions, answers: {} });
  const intro = `Hi! I'll help you fill in this document. There ${
    definitions.length === 1 ? "is 1 field" : `are ${definitions.length} fields`
  } to complete, and you can answer several at once.`;
  return plan.question ? `${intro} ${plan.question}` : intro;
}

/** Record the greeting. Cursor and phase stay at their initial values. */
export function greet(
  session: FillSession,
  definitions: readonly PlaceholderDefinition[],
  now: string,
): { session: FillSession; assistantText: string } {
  const assistantText = openingMessage(definitions);
  return {
    assistantText,
    session: {
      ...session,
      conversationLog: [...session.conversationLog, { role: "assistant", text: assistantText, at: now }],
      updatedAt: now,
    },
  };
}

function acknowledge(
  interpretation: Interpretation,
  definitions: readonly PlaceholderDefinition[],
): string {
  if (interpretation.assignments.length === 0) return "";
  const labelOf = new Map(definitions.map((d) => [d.id, d.label]));
  const parts = interpretation.assignments.map(
    (a) => `**${labelOf.get(a.placeholderId) ?? a.placeholderId}**: ${a.value}`,
  );
  return `Got it — ${parts.join("; ")}.`;
}

function composeReply(
  plan: TurnPlan,
  phase: SessionPhase,
  ack: string,
  progress: Progress,
): string {
  const lead = ack ? `${ack} ` : "";
  if (plan.kind === "complete") {
    return `${lead}All ${progress.total} fields are filled. You can download the completed document now, or tell me anything you'd like to change.`;
  }
  if (phase === "idle") {
    return `I didn't find a value for any field in that message. ${plan.question}`;
  }
  return `${lead}${plan.question}`;
}

export type TurnResult = {
  session: FillSession;
  assistantText: string;
  plan: TurnPlan;
  progress: Progress;
};

/**
 * Apply one interpreted user turn. All assignments land together (last
 * write wins per field); the cursor is recomputed from answers and
 * definition order, with rejected fields taking priority.
 */
export function applyTurn(args: {
  session: FillSession;
  definitions: readonly PlaceholderDefinition[];
  userText: string;
  interpretation: Interpretation;
  now: string;
}): TurnResult {
  const { session, definitions, interpretation, now } = args;

  const answers = { ...session.answers };
  for (const a of interpretation.assignments) {
    answers[a.placeholderId] = {
      value: a.value,
      raw: a.raw,
      confidence: a.confidence,
      filledAt: now,
    };
  }

  const plan = buildTurnPlan({
    definitions,
    answers,
    rejected: interpretation.rejected,
    editTarget: interpretation.editTarget,
  });

  const nothingUsable =
    interpretation.assignments.length === 0 &&
    interpretation.rejected.length === 0 &&
    interpretation.editTarget === null;

  let phase: SessionPhase;
  if (plan.kind === "complete") phase = "complete";
  else if (nothingUsable && session.cursor !== null) phase = "idle";
  else phase = "asking";

  const progress = computeProgress(definitions, answers);
  const assistantText = composeReply(plan, phase, acknowledge(interpretation, definitions), progress);

  const next: FillSession = {
    ...session,
    answers,
    conversationLog: [
      ...session.conversationLog,
      { role: "user", text: args.userText, at: now },
      { role: "assistant", text: assistantText, at: now },
    ],
    cursor: plan.cursor,
    phase,
    updatedAt: now,
    completedAt: phase === "complete" ? (session.completedAt ?? now) : session.completedAt,
  };

  return { session: next, assistantText, plan, progress };
}
