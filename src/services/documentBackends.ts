export interface PdfDocument {
  pageCount: number;
  /** Text of one page, 1-based. */
  pageText(pageNumber: number): Promise<string>;
  close(): Promise<void>;
}

export interface PdfBackend {
  open(bytes: Buffer): Promise<PdfDocument>;
}

export interface DocxBackend {
  paragraphs(bytes: Buffer): Promise<string[]>;
}

// Parser libraries are imported on first use
export const pdfParseBackend: PdfBackend = {
  async open(bytes) {
    const { PDFParse } = await import('pdf-parse');
    const parser = new PDFParse({ data: bytes });
    try {
      const info = await parser.getInfo();
      return {
        pageCount: info.total,
        async pageText(pageNumber) {
          // result.text carries page markers; the page entry holds the bare text
          const result = await parser.getText({ partial: [pageNumber] });
          return result.pages.find((page) => page.num === pageNumber)?.text ?? '';
        },
        close: () => parser.destroy(),
      };
    } catch (error) {
      await parser.destroy();
      throw error;
    }
  },
};

// mammoth terminates every paragraph with a blank line
export const mammothBackend: DocxBackend = {
  async paragraphs(bytes) {
    const { extractRawText } = await import('mammoth');
    const result = await extractRawText({ buffer: bytes });
    const paragraphs = result.value.split('\n\n');
    if (paragraphs.length > 0 && paragraphs[paragraphs.length - 1] === '') {
      paragraphs.pop();
    }
    return paragraphs;
  },
};
