import { Logger } from "../config/logger";
import { errorMessage } from "../shared/errors";
import { ResumeExtraction } from "../shared/types/assessment.types";
import { extractDocxText } from "./extractors/docx.extractor";
import { ExtractedDocument, extractPdfText } from "./extractors/pdf.extractor";

export type ResumeDocumentType = "pdf" | "docx" | "text" | "unknown";

export interface ResumeUpload {
  buffer: Buffer;
  fileName?: string;
  mimeType?: string;
}

export type DocumentExtractor = (buffer: Buffer) => Promise<ExtractedDocument>;

export interface DocumentExtractors {
  pdf: DocumentExtractor;
  docx: DocumentExtractor;
}

const DEFAULT_EXTRACTORS: DocumentExtractors = {
  pdf: extractPdfText,
  docx: extractDocxText,
};

const DOCX_MIME = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export class DocumentService {
  constructor(
    private readonly logger: Logger,
    private readonly extractors: DocumentExtractors = DEFAULT_EXTRACTORS,
  ) {}

  detectDocumentType(fileName?: string, mimeType?: string): ResumeDocumentType {
    const normalizedFileName = (fileName ?? "").toLowerCase();
    const normalizedMime = (mimeType ?? "").toLowerCase();

    if (normalizedMime.includes("pdf") || normalizedFileName.endsWith(".pdf")) {
      return "pdf";
    }
    if (normalizedMime.includes(DOCX_MIME) || normalizedFileName.endsWith(".docx")) {
      return "docx";
    }
    if (normalizedMime.startsWith("text/plain") || normalizedFileName.endsWith(".txt")) {
      return "text";
    }
    return "unknown";
  }

  /**
   * Resume text for the consistency check. Failures come back as `ok: false` so the
   * assessment can start without one.
   */
  async extractResume(upload: ResumeUpload): Promise<ResumeExtraction> {
    const type = this.detectDocumentType(upload.fileName, upload.mimeType);
    if (type === "unknown") {
      this.logger.warn("document.extract.unsupported", {
        fileName: upload.fileName,
        mimeType: upload.mimeType,
      });
      return { ok: false, text: "" };
    }

    let extracted: ExtractedDocument;
    try {
      extracted =
        type === "text"
          ? { text: upload.buffer.toString("utf8"), warnings: [] }
          : await this.extractors[type](upload.buffer);
    } catch (error) {
      this.logger.warn("document.extract.failed", {
        type,
        fileName: upload.fileName,
        error: errorMessage(error),
      });
      return { ok: false, text: "" };
    }

    const compactText = compactDocumentText(extracted.text);
    this.logger.info("document.extract.completed", {
      type,
      fileName: upload.fileName,
      chars: compactText.length,
      warnings: extracted.warnings.length,
    });
    return { ok: compactText.length > 0, text: compactText };
  }
}

export function compactDocumentText(text: string): string {
  return text.replace(/\u0000/g, "").replace(/\s+/g, " ").trim();
}
