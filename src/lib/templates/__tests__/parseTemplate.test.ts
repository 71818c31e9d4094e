import test from "node:test";
import assert from "node:assert/strict";

import JSZip from "jszip";

import { ParseError } from "@/lib/fill/errors";
import { buildDocx } from "@/lib/testing/fakes";
import { detectTemplateFormat, parseTemplate } from "../parseTemplate";

test("detectTemplateFormat: by extension, then by zip magic", () => {
  assert.equal(detectTemplateFormat("Lease.DOCX", Buffer.from("x")), "docx");
  assert.equal(detectTemplateFormat("nda.txt", Buffer.from("x")), "text");
  assert.equal(detectTemplateFormat("notes.md", Buffer.from("x")), "text");
  assert.equal(detectTemplateFormat("upload", Buffer.from([0x50, 0x4b, 0x03, 0x04, 0x00])), "docx");
});

test("detectTemplateFormat: unknown types are a ParseError", () => {
  assert.throws(() => detectTemplateFormat("scan.pdf", Buffer.from("%PDF-1.7")), ParseError);
});

test("parseTemplate: text lines become blocks, BOM dropped", async () => {
  const parsed = await parseTemplate(Buffer.from("\uFEFFTenant: [Tenant Name]\r\nRent: $[____]"), "lease.txt");
  assert.equal(parsed.format, "text");
  assert.deepEqual(parsed.blocks, [
    { index: 0, text: "Tenant: [Tenant Name]" },
    { index: 1, text: "Rent: $[____]" },
  ]);
});

test("parseTemplate: docx paragraphs join their runs", async () => {
  const bytes = await buildDocx([["This lease is made by ", "[Landlord", " Name]", "."], "Second paragraph"]);
  const parsed = await parseTemplate(bytes, "lease.docx");
  assert.equal(parsed.format, "docx");
  assert.deepEqual(parsed.blocks, [
    { index: 0, text: "This lease is made by [Landlord Name]." },
    { index: 1, text: "Second paragraph" },
  ]);
});

test("parseTemplate: empty input is a ParseError", async () => {
  await assert.rejects(() => parseTemplate(Buffer.alloc(0), "empty.txt"), ParseError);
});

test("parseTemplate: binary data in a text template is a ParseError", async () => {
  await assert.rejects(() => parseTemplate(Buffer.from([0x41, 0x00, 0x42]), "bad.txt"), /binary data/);
});

test("parseTemplate: corrupt docx is a ParseError", async () => {
  await assert.rejects(
    () => parseTemplate(Buffer.from("definitely not a zip"), "broken.docx"),
    (err: unknown) => err instanceof ParseError && err.message === "template is not a readable .docx archive",
  );
});

test("parseTemplate: docx without word/document.xml is a ParseError", async () => {
  const zip = new JSZip();
  zip.file("hello.txt", "hi");
  const bytes = await zip.generateAsync({ type: "nodebuffer" });
  await assert.rejects(
    () => parseTemplate(bytes, "hollow.docx"),
    (err: unknown) => err instanceof ParseError && err.message === "template is missing word/document.xml",
  );
});
