// src/lib/fill/normalize.ts
import type { PlaceholderDefinition, PlaceholderKind } from "@/lib/fill/types";

export type NormalizeResult =
  | { ok: true; value: string }
  | { ok: false; reason: "empty" | "invalid_date" | "invalid_amount" | "restates_label" };

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

function monthFromName(name: string): number | null {
  const n = name.toLowerCase().replace(/\.$/, "");
  if (n.length < 3) return null;
  const idx = MONTHS.findIndex((m) => m.startsWith(n) || (n === "sept" && m === "september"));
  return idx === -1 ? null : idx + 1;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function collapseWhitespace(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}

function stripQuotes(s: string): string {
  const m = s.match(/^(["'“”‘’])(.*)(["'“”‘’])$/s);
  return m ? (m[2] ?? "") : s;
}

type YMD = { year: number; month: number; day: number };

function validDate(d: YMD): YMD | null {
  if (d.year < 1000 || d.year > 9999) return null;
  if (d.month < 1 || d.month > 12) return null;
  if (d.day < 1 || d.day > daysInMonth(d.year, d.month)) return null;
  return d;
}

const ISO_DATE = /\b(\d{4})-(\d{1,2})-(\d{1,2})\b/;
const NUMERIC_DATE = /\b(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})\b/;
const MONTH_FIRST = /\b([A-Za-z]{3,9}\.?)\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})\b/;
const DAY_FIRST = /\b(\d{1,2})(?:st|nd|rd|th)?\s+(?:of\s+)?([A-Za-z]{3,9}\.?),?\s+(\d{4})\b/;

/**
 * Parse a calendar date out of free text. Numeric dates are read month-first
 * (03/04/2025 is March 4) unless the first number cannot be a month.
 */
export function parseCalendarDate(input: string): YMD | null {
  const s = collapseWhitespace(input);

  const iso = s.match(ISO_DATE);
  if (iso) {
    return validDate({ year: Number(iso[1]), month: Number(iso[2]), day: Number(iso[3]) });
  }

  const num = s.match(NUMERIC_DATE);
  if (num) {
    const a = Number(num[1]);
    const b = Number(num[2]);
    const year = Number(num[3]);
    return a > 12
      ? validDate({ year, month: b, day: a })
      : validDate({ year, month: a, day: b });
  }

  const mf = s.match(MONTH_FIRST);
  if (mf) {
    const month = monthFromName(mf[1] ?? "");
    if (month) return validDate({ year: Number(mf[3]), month, day: Number(mf[2]) });
  }

  const df = s.match(DAY_FIRST);
  if (df) {
    const month = monthFromName(df[2] ?? "");
    if (month) return validDate({ year: Number(df[3]), month, day: Number(df[1]) });
  }

  return null;
}

export function formatLegalDate(d: YMD): string {
  const name = MONTHS[d.month - 1] ?? "";
  return `${name.charAt(0).toUpperCase()}${name.slice(1)} ${d.day}, ${d.year}`;
}

const AMOUNT =
  /^(-)?\s*(?:[A-Z]{3}\s*)?[$€£¥₹]?\s*(-)?\s*(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d+))?\s*(k|m|thousand|million)?\s*(?:[A-Z]{3})?(?:\s*(?:\/|per)\s*[a-z]+|\s*(?:dollars?|euros?|pounds?))*$/i;

const SCALE: Record<string, number> = { k: 3, thousand: 3, m: 6, million: 6 };

/** Move the decimal point `places` to the right, in string space (no float error). */
function shiftDecimal(intPart: string, fracPart: string, places: number): [string, string] {
  const padded = fracPart.padEnd(places, "0");
  return [intPart + padded.slice(0, places), padded.slice(places)];
}

/**
 * "$1,200/month" → "1200", "-30" → "-30", "1.5k" → "1500", "USD 99.90" → "99.9".
 * Null when the text is not a single signed decimal.
 */
export function parseAmount(input: string): string | null {
  const m = collapseWhitespace(input).match(AMOUNT);
  if (!m) return null;

  const negative = Boolean(m[1] || m[2]);
  let intPart = (m[3] ?? "").replace(/,/g, "");
  let fracPart = m[4] ?? "";

  const suffix = m[5]?.toLowerCase();
  if (suffix) [intPart, fracPart] = shiftDecimal(intPart, fracPart, SCALE[suffix] ?? 0);

  intPart = intPart.replace(/^0+(?=\d)/, "");
  fracPart = fracPart.replace(/0+$/, "");

  const magnitude = fracPart ? `${intPart}.${fracPart}` : intPart;
  const isZero = /^0(?:\.0*)?$/.test(magnitude);
  return negative && !isZero ? `-${magnitude}` : magnitude;
}

function restatesLabel(value: string, def: Pick<PlaceholderDefinition, "label" | "id">): boolean {
  const v = value.toLowerCase().replace(/[.:]+$/, "");
  const label = def.label.toLowerCase();
  const idWords = def.id.replace(/_/g, " ");
  return (
    v === label ||
    v === idWords ||
    v === `the ${label}` ||
    v === `the ${idWords}` ||
    (v.startsWith("the ") && v.includes(label) && v.length <= label.length + 8)
  );
}

/**
 * Deterministic per-kind validation of a proposed value. This is the only
 * gate between model output and recorded answers.
 */
export function normalizeValue(
  def: Pick<PlaceholderDefinition, "id" | "label" | "kind">,
  raw: string,
): NormalizeResult {
  const cleaned = collapseWhitespace(stripQuotes(collapseWhitespace(raw)));
  if (!cleaned) return { ok: false, reason: "empty" };
  if (restatesLabel(cleaned, def)) return { ok: false, reason: "restates_label" };

  return normalizeByKind(def.kind, cleaned);
}

function normalizeByKind(kind: PlaceholderKind, cleaned: string): NormalizeResult {
  switch (kind) {
    case "date": {
      const d = parseCalendarDate(cleaned);
      return d ? { ok: true, value: formatLegalDate(d) } : { ok: false, reason: "invalid_date" };
    }
    case "amount": {
      const amount = parseAmount(cleaned);
      return amount !== null ? { ok: true, value: amount } : { ok: false, reason: "invalid_amount" };
    }
    case "text":
    case "party-name":
    case "address":
    case "duration":
    case "other":
      return { ok: true, value: cleaned };
  }
}
