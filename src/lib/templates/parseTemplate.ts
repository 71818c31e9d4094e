// src/lib/templates/parseTemplate.ts
import path from "node:path";

import { ParseError } from "@/lib/fill/errors";
import type { TemplateFormat } from "@/lib/fill/types";
import { loadDocx } from "@/lib/templates/docxXml";

/** One addressable run of document text (a paragraph or a line). */
export type TextBlock = {
  index: number;
  text: string;
};

export type ParsedTemplate = {
  format: TemplateFormat;
  blocks: TextBlock[];
};

const TEXT_EXTENSIONS = new Set([".txt", ".text", ".md"]);

export function detectTemplateFormat(filename: string, bytes: Uint8Array): TemplateFormat {
  const ext = path.extname(filename).toLowerCase();
  if (ext === ".docx") return "docx";
  if (TEXT_EXTENSIONS.has(ext)) return "text";

  // "PK\x03\x04": zip container
  if (bytes[0] === 0x50 && bytes[1] === 0x4b && bytes[2] === 0x03 && bytes[3] === 0x04) return "docx";

  throw new ParseError(`unsupported template type: ${ext || "(no extension)"}`);
}

export function splitTextLines(text: string): string[] {
  return text.split(/\r?\n/);
}

export function decodeTextTemplate(bytes: Uint8Array): string {
  const text = Buffer.from(bytes).toString("utf8");
  if (text.includes("\u0000")) {
    throw new ParseError("text template contains binary data");
  }
  // Drop a UTF-8 BOM so offsets start at the first visible character.
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

export async function parseTemplate(
  bytes: Uint8Array,
  filename: string,
  format: TemplateFormat = detectTemplateFormat(filename, bytes),
): Promise<ParsedTemplate> {
  if (bytes.length === 0) throw new ParseError("template is empty");

  if (format === "docx") {
    const doc = await loadDocx(bytes);
    return {
      format,
      blocks: doc.paragraphs.map((p, index) => ({ index, text: p.text })),
    };
  }

  const lines = splitTextLines(decodeTextTemplate(bytes));
  return {
    format,
    blocks: lines.map((text, index) => ({ index, text })),
  };
}
