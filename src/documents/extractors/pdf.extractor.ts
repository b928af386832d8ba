import pdfParse from "pdf-parse";

export interface ExtractedDocument {
  text: string;
  warnings: string[];
}

export async function extractPdfText(buffer: Buffer): Promise<ExtractedDocument> {
  const result = await pdfParse(buffer);
  return {
    text: result.text,
    warnings: result.numpages === 0 ? ["PDF has no pages"] : [],
  };
}
