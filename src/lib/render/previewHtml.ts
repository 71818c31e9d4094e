/**
 * Preview HTML Renderer
 *
 * One <p> per template block. Filled placeholders show their value,
 * unfilled ones keep the template text, each wrapped in a span that names
 * the placeholder. Output depends only on (template, definitions, answers):
 * no timestamps, no ids.
 */

import type { TextBlock } from "@/lib/templates/parseTemplate";
import type { FilledValue, PlaceholderDefinition, Progress } from "@/lib/fill/types";

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

type Marked = { start: number; end: number; placeholderId: string; value: string | null };

function renderBlock(text: string, marks: Marked[]): string {
  let html = "";
  let pos = 0;
  for (const m of [...marks].sort((a, b) => a.start - b.start)) {
    if (m.start < pos || m.end > text.length) continue;
    html += escapeHtml(text.slice(pos, m.start));
    const id = escapeHtml(m.placeholderId);
    html +=
      m.value !== null
        ? `<span class="filled-value" data-placeholder="${id}">${escapeHtml(m.value)}</span>`
        : `<span class="pending-value" data-placeholder="${id}">${escapeHtml(text.slice(m.start, m.end))}</span>`;
    pos = m.end;
  }
  html += escapeHtml(text.slice(pos));
  return `<p>${html}</p>`;
}

const STYLE = [
  "body { font-family: Georgia, serif; max-width: 48rem; margin: 2rem auto; line-height: 1.5; }",
  "header { border-bottom: 1px solid #ccc; margin-bottom: 1.5rem; }",
  ".filled-value { background: #e6f4ea; border-bottom: 1px solid #34a853; }",
  ".pending-value { background: #fef7e0; border-bottom: 1px dashed #f9ab00; }",
].join("\n");

export function renderPreviewHtml(args: {
  filename: string;
  blocks: readonly TextBlock[];
  definitions: readonly PlaceholderDefinition[];
  answers: Readonly<Record<string, FilledValue>>;
  progress: Progress;
}): string {
  const byBlock = new Map<number, Marked[]>();
  for (const def of args.definitions) {
    const value = args.answers[def.id]?.value ?? null;
    for (const a of def.anchors) {
      const block = args.blocks[a.blockIndex];
      if (!block || block.text.slice(a.start, a.end) !== a.excerpt) continue;
      const list = byBlock.get(a.blockIndex) ?? [];
      list.push({ start: a.start, end: a.end, placeholderId: def.id, value });
      byBlock.set(a.blockIndex, list);
    }
  }

  const body = args.blocks
    .map((b) => renderBlock(b.text, byBlock.get(b.index) ?? []))
    .join("\n");

  const title = escapeHtml(args.filename);
  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8">',
    `<title>Preview: ${title}</title>`,
    `<style>\n${STYLE}\n</style>`,
    "</head>",
    "<body>",
    "<header>",
    `<h1>${title}</h1>`,
    `<p class="progress">Filled ${args.progress.filled} of ${args.progress.total}</p>`,
    "</header>",
    "<main>",
    body,
    "</main>",
    "</body>",
    "</html>",
    "",
  ].join("\n");
}
