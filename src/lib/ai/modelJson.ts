// src/lib/ai/modelJson.ts
import type { z } from "zod";

/** Finds the first balanced {...} object in a string. */
export function extractFirstJsonObject(text: string): string | null {
  const start = text.indexOf("{");
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  for (let i = start; i < text.length; i++) {
    const c = text[i];
    if (inString) {
      if (c === "\\") i++;
      else if (c === '"') inString = false;
      continue;
    }
    if (c === '"') inString = true;
    else if (c === "{") depth++;
    else if (c === "}") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith("```")) return trimmed;
  const lines = trimmed.split("\n");
  if (lines.length <= 2) return trimmed;
  const body = lines.slice(1);
  if (body[body.length - 1]?.trim().startsWith("```")) body.pop();
  return body.join("\n").trim();
}

function safeJsonParse(s: string): unknown {
  try {
    return JSON.parse(s);
  } catch {
    return undefined;
  }
}

/**
 * Parse model output against a schema. Tolerates markdown fences and prose
 * around the JSON object. Returns null instead of throwing: model output is
 * never trusted to be well-formed.
 */
export function parseModelJson<T>(
  text: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T | null {
  const cleaned = stripCodeFence(text);

  let parsed = safeJsonParse(cleaned);
  if (parsed === undefined) {
    const obj = extractFirstJsonObject(cleaned);
    if (obj) parsed = safeJsonParse(obj);
  }
  if (parsed === undefined) return null;

  const result = schema.safeParse(parsed);
  return result.success ? result.data : null;
}
