// src/lib/placeholders/patterns.ts
import type { PlaceholderKind } from "@/lib/fill/types";
import type { TextBlock } from "@/lib/templates/parseTemplate";

export type CandidateRule =
  | "bracket"
  | "curly"
  | "angle"
  | "money_blank"
  | "marker"
  | "underscore"
  | "date_mask"
  | "tbd";

/**
 * A detected span before merging. `label === null` marks an ambiguous span
 * (blank, marker, mask) whose meaning has to come from surrounding text.
 */
export type CandidateSpan = {
  blockIndex: number;
  start: number;
  end: number;
  excerpt: string;
  rule: CandidateRule;
  label: string | null;
  kind: PlaceholderKind | null;
  hint: string | null;
};

const MAX_TOKEN_CHARS = 80;
const HINT_RADIUS = 60;

type PatternRule = {
  rule: CandidateRule;
  re: RegExp;
  kind: PlaceholderKind | null;
  /** Capture group holding the field name, for named tokens. */
  named: boolean;
};

const PATTERNS: PatternRule[] = [
  { rule: "curly", re: /\{\{\s*([^{}]{1,80}?)\s*\}\}/g, kind: null, named: true },
  { rule: "angle", re: /<<\s*([^<>]{1,80}?)\s*>>/g, kind: null, named: true },
  { rule: "angle", re: /«\s*([^«»]{1,80}?)\s*»/g, kind: null, named: true },
  { rule: "money_blank", re: /\$\s?\[[\s_.]*\]|\$\s?_{3,}/g, kind: "amount", named: false },
  { rule: "bracket", re: /\[([^[\]\n]{1,200})\]/g, kind: null, named: true },
  { rule: "underscore", re: /_{3,}/g, kind: null, named: false },
  {
    rule: "date_mask",
    re: /\b(?:DD|MM)[/.-](?:MM|DD)[/.-](?:YYYY|YY)\b|\bYYYY-MM-DD\b/g,
    kind: "date",
    named: false,
  },
  { rule: "tbd", re: /\bTBD\b|\b[Tt]o [Bb]e [Dd]etermined\b/g, kind: null, named: false },
];

/** Bracket contents that are fill markers rather than names: [___], [●], [ ], [*]. */
const MARKER_CONTENT = /^[\s_.…●•*xX-]*$/;
/** Date masks written inside brackets: [DD/MM/YYYY]. */
const DATE_MASK_CONTENT = /^(?:DD|MM)[/.-](?:MM|DD)[/.-](?:YYYY|YY)$|^YYYY-MM-DD$/;
/** Footnote / clause references: [1], [iv], [a]. */
const REFERENCE_CONTENT = /^(?:\d+|[ivxlc]+|[a-z])$/i;

function humanizeToken(raw: string): string {
  const spaced = raw
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .replace(/[_-]+/g, " ")
    .replace(/\s+/g, " ")
    .trim();

  const allCaps = spaced === spaced.toUpperCase();
  return spaced
    .split(" ")
    .map((w) => {
      if (!allCaps && w.length > 1 && w === w.toUpperCase()) return w; // keep LLC, EIN
      return w.charAt(0).toUpperCase() + w.slice(1).toLowerCase();
    })
    .join(" ");
}

const KIND_RULES: Array<[RegExp, PlaceholderKind]> = [
  [/\bdate\b|\bdated\b/i, "date"],
  [/amount|price|\brent\b|\bfees?\b|deposit|salary|payment|\bsum\b|\bcost\b|valuation|\$/i, "amount"],
  [/\bterm\b|period|duration|\bmonths?\b|\byears?\b|\bdays?\b|\bweeks?\b/i, "duration"],
  [/address|street|\bcity\b|premises|location/i, "address"],
  [
    /\bname\b|party|tenant|landlord|lessor|lessee|buyer|seller|employer|employee|company|investor|client|contractor|vendor|licensee|licensor|borrower|lender|signatory/i,
    "party-name",
  ],
];

export function inferKindFromLabel(label: string): PlaceholderKind {
  for (const [re, kind] of KIND_RULES) {
    if (re.test(label)) return kind;
  }
  return "text";
}

export function hintAround(text: string, start: number, end: number): string | null {
  const before = text.slice(Math.max(0, start - HINT_RADIUS), start);
  const after = text.slice(end, end + HINT_RADIUS);
  const hint = `${before}…${after}`.replace(/\s+/g, " ").trim();
  return hint === "…" ? null : hint;
}

const LEADING_FILLER = new Set(["the", "a", "an"]);
const TRAILING_FILLER = new Set(["the", "a", "an", "of", "is", "at", "on", "as", "to"]);

/**
 * Label an ambiguous span from the words right before it:
 * "Signed by: ____" → "Signed By". Null when nothing usable precedes it.
 */
export function labelFromPrecedingText(text: string, start: number): string | null {
  const before = text
    .slice(0, start)
    .replace(/[\s:;,.$(\-–—]+$/, "");
  const words = before.split(/\s+/).filter((w) => /[A-Za-z]/.test(w)).slice(-4);
  // Only words since the last sentence/field break belong to this blank.
  let clauseStart = -1;
  words.forEach((w, i) => {
    if (/[.;:)]$/.test(w)) clauseStart = i;
  });
  const clause = words.slice(clauseStart + 1).map((w) => w.replace(/[^A-Za-z'-]/g, ""));

  while (clause.length > 0 && LEADING_FILLER.has((clause[0] ?? "").toLowerCase())) clause.shift();
  while (clause.length > 0 && TRAILING_FILLER.has((clause[clause.length - 1] ?? "").toLowerCase())) clause.pop();

  const label = clause.filter(Boolean).join(" ");
  return label ? humanizeToken(label) : null;
}

function matchBlock(block: TextBlock): CandidateSpan[] {
  const out: CandidateSpan[] = [];

  for (const p of PATTERNS) {
    p.re.lastIndex = 0;
    for (const m of block.text.matchAll(p.re)) {
      const start = m.index ?? 0;
      const excerpt = m[0];
      const end = start + excerpt.length;
      const base = {
        blockIndex: block.index,
        start,
        end,
        excerpt,
        hint: hintAround(block.text, start, end),
      };

      if (!p.named) {
        out.push({ ...base, rule: p.rule, label: null, kind: p.kind });
        continue;
      }

      const content = (m[1] ?? "").trim();
      if (p.rule === "bracket" && MARKER_CONTENT.test(content)) {
        out.push({ ...base, rule: "marker", label: null, kind: null });
        continue;
      }
      if (DATE_MASK_CONTENT.test(content)) {
        out.push({ ...base, rule: "date_mask", label: null, kind: "date" });
        continue;
      }
      if (content.length > MAX_TOKEN_CHARS || REFERENCE_CONTENT.test(content)) continue;
      if (!/[A-Za-z]/.test(content)) continue;

      const label = humanizeToken(content);
      out.push({ ...base, rule: p.rule, label, kind: inferKindFromLabel(label) });
    }
  }

  return out;
}

/**
 * Longer, more specific match wins; anything overlapping an accepted span
 * (including spans fully inside it) is dropped. Output is in text order.
 */
export function resolveOverlaps(candidates: CandidateSpan[]): CandidateSpan[] {
  const byStrength = [...candidates].sort(
    (a, b) => b.end - b.start - (a.end - a.start) || a.start - b.start,
  );

  const accepted: CandidateSpan[] = [];
  for (const c of byStrength) {
    const clash = accepted.some(
      (a) => a.blockIndex === c.blockIndex && c.start < a.end && a.start < c.end,
    );
    if (!clash) accepted.push(c);
  }

  return accepted.sort((a, b) => a.blockIndex - b.blockIndex || a.start - b.start);
}

/** Deterministic detection layer over all blocks, in document order. */
export function detectCandidates(blocks: readonly TextBlock[]): CandidateSpan[] {
  const out: CandidateSpan[] = [];
  for (const block of blocks) {
    if (!block.text) continue;
    out.push(...resolveOverlaps(matchBlock(block)));
  }
  return out;
}
