import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { PageText } from './chunker';
import { normalizeText } from './textUtils';

export interface ExtractedText {
  text: string;
  pageCount: number;
  /** Pages that carry text, in order; blank pages are left out. */
  pages: PageText[];
}

export type TextExtractor = (bytes: Uint8Array) => Promise<ExtractedText>;

/**
 * Reads the text layer of a PDF page by page. Scanned pages without a text
 * layer come back empty.
 */
export async function extractPdfText(bytes: Uint8Array): Promise<ExtractedText> {
  // pdfjs takes ownership of the buffer it is given.
  const loadingTask = getDocument({ data: new Uint8Array(bytes), isEvalSupported: false });
  const pdf = await loadingTask.promise.catch(async (error: unknown) => {
    await loadingTask.destroy();
    throw error;
  });

  try {
    const pages: PageText[] = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber += 1) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();

      let raw = '';
      for (const item of content.items) {
        if ('str' in item) {
          raw += item.str + (item.hasEOL ? '\n' : ' ');
        }
      }

      const text = normalizeText(raw);
      if (text) {
        pages.push({ pageNumber, text });
      }
      page.cleanup();
    }

    return {
      text: pages.map((page) => page.text).join('\n\n'),
      pageCount: pdf.numPages,
      pages,
    };
  } finally {
    await pdf.destroy();
  }
}
