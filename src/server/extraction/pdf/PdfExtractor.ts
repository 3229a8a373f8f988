/**
 * PdfExtractor - Extract text from PDF documents
 *
 * Pages are read in document order and their text concatenated. A page without
 * a text layer (scanned/image-only) contributes an empty segment; a payload that
 * is not a PDF yields empty text. Neither case throws.
 */

import pdfParse from 'pdf-parse/lib/pdf-parse.js';
import { DocumentParseError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * PDF extraction result
 */
export interface PdfExtractionResult {
  text: string;
  pageCount: number;
  /** false when the payload could not be parsed as a PDF at all */
  readable: boolean;
}

export interface TextExtractor {
  extract(data: Buffer): Promise<string>;
  extractDetailed(data: Buffer): Promise<PdfExtractionResult>;
}

const PDF_MAGIC = '%PDF-';

/**
 * PdfExtractor - Extract text from PDF
 */
export class PdfExtractor implements TextExtractor {
  async extract(data: Buffer): Promise<string> {
    const result = await this.extractDetailed(data);
    return result.text;
  }

  /**
   * Extract text from PDF buffer together with page count and readability
   */
  async extractDetailed(data: Buffer): Promise<PdfExtractionResult> {
    try {
      this.assertLooksLikePdf(data);

      // pdf.js resolves streams against the underlying ArrayBuffer, which a
      // pooled Buffer shares with unrelated bytes
      const parsed = await pdfParse(new Uint8Array(data));
      const text = (parsed.text || '').trim();
      const pageCount = parsed.numpages || 0;

      logger.debug(
        {
          pageCount,
          textLength: text.length,
          isScanned: pageCount > 0 && text.length === 0,
        },
        'PDF extraction completed'
      );

      return {
        text,
        pageCount,
        readable: true,
      };
    } catch (error) {
      const parseError = error instanceof DocumentParseError
        ? error
        : new DocumentParseError(
          `PDF extraction failed: ${error instanceof Error ? error.message : String(error)}`,
          error
        );
      logger.warn({ error: parseError.message, bytes: data.length }, 'PDF payload is unreadable');
      return { text: '', pageCount: 0, readable: false };
    }
  }

  private assertLooksLikePdf(data: Buffer): void {
    // The header may be preceded by junk bytes; readers accept it within the first 1 KB
    const head = data.subarray(0, 1024).toString('latin1');
    if (!head.includes(PDF_MAGIC)) {
      throw new DocumentParseError('Payload does not carry a PDF header');
    }
  }
}
