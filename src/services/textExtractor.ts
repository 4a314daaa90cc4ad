import type { ExtractionCapabilities } from '../config/env';
import { CapabilityUnavailableError, HttpError, MalformedInputError } from '../utils/errors';
import { mammothBackend, pdfParseBackend, type DocxBackend, type PdfBackend } from './documentBackends';

export interface TextExtractor {
  extract(filename: string, bytes: Buffer): Promise<string>;
}

export interface TextExtractorOptions {
  capabilities: ExtractionCapabilities;
  pdf?: PdfBackend;
  docx?: DocxBackend;
}

const DOCX_EXTENSIONS = ['docx', 'doc'];

/** Everything after the last dot, lowercased; a name without a dot is its own extension. */
export function fileExtension(filename: string): string {
  return filename.slice(filename.lastIndexOf('.') + 1).toLowerCase();
}

const ENCODED_REPLACEMENT = Buffer.from([0xef, 0xbf, 0xbd]);

/**
 * Lossy UTF-8 decode: invalid sequences are dropped, a BOM and any
 * U+FFFD actually present in the input are kept.
 */
export function decodeUtf8(bytes: Buffer): string {
  const decoder = new TextDecoder('utf-8', { ignoreBOM: true });
  const decodeChunk = (chunk: Buffer) => decoder.decode(chunk).replace(/\uFFFD/g, '');

  // EF BF BD always starts a sequence, so splitting on it leaves every chunk's decoding unchanged
  const parts: string[] = [];
  let start = 0;
  let at = bytes.indexOf(ENCODED_REPLACEMENT);
  while (at !== -1) {
    parts.push(decodeChunk(bytes.subarray(start, at)));
    start = at + ENCODED_REPLACEMENT.length;
    at = bytes.indexOf(ENCODED_REPLACEMENT, start);
  }
  parts.push(decodeChunk(bytes.subarray(start)));
  return parts.join('\uFFFD');
}

async function extractPdf(backend: PdfBackend, bytes: Buffer): Promise<string> {
  const document = await backend.open(bytes);
  try {
    const texts: string[] = [];
    for (let page = 1; page <= document.pageCount; page++) {
      try {
        texts.push(await document.pageText(page));
      } catch {
        // unreadable page, keep the rest of the file
        continue;
      }
    }
    return texts.join('\n').trim();
  } finally {
    await document.close();
  }
}

async function extractDocx(backend: DocxBackend, bytes: Buffer): Promise<string> {
  const paragraphs = await backend.paragraphs(bytes);
  return paragraphs.join('\n').trim();
}

export function createTextExtractor({
  capabilities,
  pdf = pdfParseBackend,
  docx = mammothBackend,
}: TextExtractorOptions): TextExtractor {
  return {
    async extract(filename, bytes) {
      const ext = fileExtension(filename);
      try {
        if (ext === 'pdf') {
          if (!capabilities.pdf) {
            throw new CapabilityUnavailableError('PDF support not available');
          }
          return await extractPdf(pdf, bytes);
        }
        if (DOCX_EXTENSIONS.includes(ext)) {
          if (!capabilities.docx) {
            throw new CapabilityUnavailableError('DOCX support not available');
          }
          return await extractDocx(docx, bytes);
        }
        return decodeUtf8(bytes);
      } catch (error) {
        if (error instanceof HttpError) throw error;
        throw new MalformedInputError(error);
      }
    },
  };
}
