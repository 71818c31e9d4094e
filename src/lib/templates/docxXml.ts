// src/lib/templates/docxXml.ts
import JSZip from "jszip";
import { XMLBuilder, XMLParser } from "fast-xml-parser";

import { ParseError } from "@/lib/fill/errors";

export const DOCUMENT_XML_PATH = "word/document.xml";

/**
 * Ordered XML node as produced by fast-xml-parser with `preserveOrder`:
 * one tag key mapping to its children, plus ":@" for attributes, or a
 * "#text" key for text nodes.
 */
export type XmlNode = Record<string, unknown>;

const ATTRS_KEY = ":@";
const TEXT_KEY = "#text";

const XML_OPTIONS = {
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  processEntities: true,
} as const;

function isXmlNode(v: unknown): v is XmlNode {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function asNodes(v: unknown): XmlNode[] {
  return Array.isArray(v) ? v.filter(isXmlNode) : [];
}

export function tagOf(node: XmlNode): string | null {
  for (const key of Object.keys(node)) {
    if (key !== ATTRS_KEY && key !== TEXT_KEY) return key;
  }
  return null;
}

export function childrenOf(node: XmlNode): XmlNode[] {
  const tag = tagOf(node);
  return tag ? asNodes(node[tag]) : [];
}

/** Concatenated direct text children of an element such as <w:t>. */
export function textOf(node: XmlNode): string {
  let out = "";
  for (const child of childrenOf(node)) {
    const t = child[TEXT_KEY];
    if (typeof t === "string" || typeof t === "number") out += String(t);
  }
  return out;
}

/** Replace an element's children with a single text node, keeping leading/trailing spaces. */
export function setText(node: XmlNode, text: string): void {
  const tag = tagOf(node);
  if (!tag) return;
  node[tag] = text.length > 0 ? [{ [TEXT_KEY]: text }] : [];

  const attrs = isXmlNode(node[ATTRS_KEY]) ? node[ATTRS_KEY] : {};
  node[ATTRS_KEY] = { ...attrs, "@_xml:space": "preserve" };
}

/** A <w:t> element and the span of block text it contributes. */
export type TextSegment = {
  node: XmlNode;
  start: number;
  end: number;
};

export type DocxParagraph = {
  text: string;
  segments: TextSegment[];
};

/**
 * Collect paragraphs in document order. A paragraph's text is the
 * concatenation of its <w:t> elements; paragraphs nested inside another
 * paragraph (text boxes) are emitted after their host.
 */
export function collectParagraphs(tree: XmlNode[]): DocxParagraph[] {
  const out: DocxParagraph[] = [];

  const visitParagraph = (p: XmlNode) => {
    const para: DocxParagraph = { text: "", segments: [] };
    const nested: XmlNode[] = [];

    const walk = (nodes: XmlNode[]) => {
      for (const node of nodes) {
        const tag = tagOf(node);
        if (tag === "w:p") {
          nested.push(node);
        } else if (tag === "w:t") {
          const text = textOf(node);
          const start = para.text.length;
          para.text += text;
          para.segments.push({ node, start, end: para.text.length });
        } else if (tag) {
          walk(childrenOf(node));
        }
      }
    };

    walk(childrenOf(p));
    out.push(para);
    for (const n of nested) visitParagraph(n);
  };

  const visit = (nodes: XmlNode[]) => {
    for (const node of nodes) {
      const tag = tagOf(node);
      if (tag === "w:p") visitParagraph(node);
      else if (tag) visit(childrenOf(node));
    }
  };

  visit(tree);
  return out;
}

export type LoadedDocx = {
  zip: JSZip;
  tree: XmlNode[];
  paragraphs: DocxParagraph[];
};

export async function loadDocx(bytes: Uint8Array): Promise<LoadedDocx> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(bytes);
  } catch (err) {
    throw new ParseError("template is not a readable .docx archive", err);
  }

  const entry = zip.file(DOCUMENT_XML_PATH);
  if (!entry) throw new ParseError(`template is missing ${DOCUMENT_XML_PATH}`);

  const xml = await entry.async("string");

  let parsed: unknown;
  try {
    parsed = new XMLParser(XML_OPTIONS).parse(xml, true);
  } catch (err) {
    throw new ParseError("template document.xml is malformed", err);
  }

  const tree = asNodes(parsed);
  if (!tree.some((n) => tagOf(n) === "w:document")) {
    throw new ParseError("template document.xml has no w:document root");
  }

  return { zip, tree, paragraphs: collectParagraphs(tree) };
}

export async function saveDocx(doc: LoadedDocx): Promise<Buffer> {
  const builder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    processEntities: true,
    suppressEmptyNode: true,
  });
  const xml: string = builder.build(doc.tree);
  doc.zip.file(DOCUMENT_XML_PATH, xml);
  return doc.zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
}
