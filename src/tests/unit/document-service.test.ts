import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { DocumentService, compactDocumentText } from "../../documents/document.service";
import { createRecordingLogger, noopLogger } from "../helpers/fakes";

const failingExtractor = async () => {
  throw new Error("corrupt archive");
};

describe("DocumentService.detectDocumentType", () => {
  const service = new DocumentService(noopLogger);

  it("prefers the mime type and falls back to the extension", () => {
    assert.equal(service.detectDocumentType("cv.bin", "application/pdf"), "pdf");
    assert.equal(service.detectDocumentType("CV.DOCX"), "docx");
    assert.equal(service.detectDocumentType(undefined, "text/plain; charset=utf-8"), "text");
    assert.equal(service.detectDocumentType("resume.rtf", "application/rtf"), "unknown");
  });
});

describe("DocumentService.extractResume", () => {
  it("reads plain text uploads directly", async () => {
    const service = new DocumentService(noopLogger, { pdf: failingExtractor, docx: failingExtractor });
    const result = await service.extractResume({
      buffer: Buffer.from("Backend engineer\n\n  5 years   of experience\u0000"),
      fileName: "resume.txt",
    });
    assert.deepEqual(result, { ok: true, text: "Backend engineer 5 years of experience" });
  });

  it("uses the extractor for the detected type", async () => {
    const service = new DocumentService(noopLogger, {
      pdf: failingExtractor,
      docx: async () => ({ text: "Frontend developer", warnings: ["Unrecognised style"] }),
    });
    const result = await service.extractResume({ buffer: Buffer.from("binary"), fileName: "resume.docx" });
    assert.deepEqual(result, { ok: true, text: "Frontend developer" });
  });

  it("reports failures without throwing", async () => {
    const { logger, entries } = createRecordingLogger();
    const service = new DocumentService(logger, { pdf: failingExtractor, docx: failingExtractor });

    const result = await service.extractResume({ buffer: Buffer.from("%PDF"), fileName: "resume.pdf" });

    assert.deepEqual(result, { ok: false, text: "" });
    assert.deepEqual(entries, [
      {
        level: "warn",
        message: "document.extract.failed",
        meta: { type: "pdf", fileName: "resume.pdf", error: "corrupt archive" },
      },
    ]);
  });

  it("rejects unsupported formats and empty documents", async () => {
    const service = new DocumentService(noopLogger, {
      pdf: async () => ({ text: "   ", warnings: [] }),
      docx: failingExtractor,
    });
    assert.deepEqual(await service.extractResume({ buffer: Buffer.from("x"), fileName: "resume.odt" }), {
      ok: false,
      text: "",
    });
    assert.deepEqual(await service.extractResume({ buffer: Buffer.from("x"), fileName: "resume.pdf" }), {
      ok: false,
      text: "",
    });
  });
});

describe("compactDocumentText", () => {
  it("collapses whitespace", () => {
    assert.equal(compactDocumentText("  a\tb\n\nc  "), "a b c");
  });
});
