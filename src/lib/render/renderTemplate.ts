// src/lib/render/renderTemplate.ts
import path from "node:path";

import { FillEngineError, RenderError } from "@/lib/fill/errors";
import {
  type FilledValue,
  type PlaceholderDefinition,
  type RenderMode,
  type RenderedArtifact,
  type TemplateFormat,
  computeProgress,
} from "@/lib/fill/types";
import { renderPreviewHtml } from "@/lib/render/previewHtml";
import { type TextSegment, loadDocx, saveDocx, setText, textOf } from "@/lib/templates/docxXml";
import {
  decodeTextTemplate,
  parseTemplate,
  splitTextLines,
} from "@/lib/templates/parseTemplate";

export const DOCX_CONTENT_TYPE =
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export type TemplateSource = {
  filename: string;
  format: TemplateFormat;
  bytes: Uint8Array;
};

export type RenderArgs = {
  template: TemplateSource;
  definitions: readonly PlaceholderDefinition[];
  answers: Readonly<Record<string, FilledValue>>;
  mode: RenderMode;
};

/** A single substitution: replace [start, end) of a block with `value`. */
type Edit = { blockIndex: number; start: number; end: number; value: string };

/**
 * Substitutions for every filled anchor whose excerpt still matches the
 * block text. Ordered by block, then descending start, so applying them in
 * order never shifts an offset that is still to be used.
 */
export function collectEdits(
  blockTexts: readonly string[],
  definitions: readonly PlaceholderDefinition[],
  answers: Readonly<Record<string, FilledValue>>,
): Edit[] {
  const edits: Edit[] = [];
  for (const def of definitions) {
    const answer = answers[def.id];
    if (!answer) continue;
    for (const a of def.anchors) {
      const text = blockTexts[a.blockIndex];
      if (text === undefined || text.slice(a.start, a.end) !== a.excerpt) continue;
      edits.push({ blockIndex: a.blockIndex, start: a.start, end: a.end, value: answer.value });
    }
  }
  return edits.sort((x, y) => x.blockIndex - y.blockIndex || y.start - x.start);
}

function stem(filename: string): string {
  const base = path.basename(filename);
  const ext = path.extname(base);
  return ext ? base.slice(0, -ext.length) : base;
}

/**
 * Write `value` over [start, end) of a paragraph whose text is split across
 * <w:t> segments. The value goes into the first touched segment (keeping
 * its run formatting); covered text in later segments is removed.
 */
function applyToSegments(segments: readonly TextSegment[], edit: Edit): void {
  let written = false;
  for (const seg of segments) {
    if (seg.end <= edit.start || seg.start >= edit.end) continue;
    const current = textOf(seg.node);
    const from = Math.max(edit.start - seg.start, 0);
    const to = Math.min(edit.end, seg.end) - seg.start;
    const head = current.slice(0, from);
    const tail = current.slice(to);
    setText(seg.node, written ? head + tail : head + edit.value + tail);
    written = true;
  }
}

async function renderDocx(args: RenderArgs): Promise<Buffer> {
  const doc = await loadDocx(args.template.bytes);
  const edits = collectEdits(
    doc.paragraphs.map((p) => p.text),
    args.definitions,
    args.answers,
  );
  for (const edit of edits) {
    const para = doc.paragraphs[edit.blockIndex];
    if (para) applyToSegments(para.segments, edit);
  }
  return saveDocx(doc);
}

function renderText(args: RenderArgs): Buffer {
  const text = decodeTextTemplate(args.template.bytes);
  const lines = splitTextLines(text);
  for (const edit of collectEdits(lines, args.definitions, args.answers)) {
    const line = lines[edit.blockIndex] ?? "";
    lines[edit.blockIndex] = line.slice(0, edit.start) + edit.value + line.slice(edit.end);
  }
  const eol = text.includes("\r\n") ? "\r\n" : "\n";
  return Buffer.from(lines.join(eol), "utf8");
}

/** Output filename and content type for a render, without rendering. */
export function artifactMeta(
  template: Pick<TemplateSource, "filename" | "format">,
  mode: RenderMode,
): { filename: string; contentType: string } {
  const name = stem(template.filename);
  if (mode === "preview") {
    return { filename: `${name}-preview.html`, contentType: "text/html; charset=utf-8" };
  }
  if (template.format === "docx") {
    return { filename: `${name}-filled.docx`, contentType: DOCX_CONTENT_TYPE };
  }
  return {
    filename: `${name}-filled${path.extname(template.filename) || ".txt"}`,
    contentType: "text/plain; charset=utf-8",
  };
}

/**
 * Produce the filled document (`final`, same format as the template) or a
 * read-only HTML view (`preview`). Only unreadable template bytes fail;
 * missing answers leave their placeholders untouched.
 */
export async function renderTemplate(args: RenderArgs): Promise<RenderedArtifact> {
  const meta = artifactMeta(args.template, args.mode);
  try {
    let bytes: Buffer;
    if (args.mode === "preview") {
      const parsed = await parseTemplate(args.template.bytes, args.template.filename, args.template.format);
      const html = renderPreviewHtml({
        filename: path.basename(args.template.filename),
        blocks: parsed.blocks,
        definitions: args.definitions,
        answers: args.answers,
        progress: computeProgress(args.definitions, args.answers),
      });
      bytes = Buffer.from(html, "utf8");
    } else if (args.template.format === "docx") {
      bytes = await renderDocx(args);
    } else {
      bytes = renderText(args);
    }
    return { mode: args.mode, ...meta, bytes };
  } catch (err) {
    if (err instanceof RenderError) throw err;
    const reason = err instanceof FillEngineError ? err.message : "unexpected failure";
    throw new RenderError(`cannot render ${args.template.filename}: ${reason}`, err);
  }
}
