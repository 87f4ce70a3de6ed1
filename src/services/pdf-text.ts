/**
 * PDF text extraction
 */

import { extractText, getDocumentProxy } from 'unpdf';
import { ParseFailedError, err, ok, type Result } from '../types/result.js';

export interface PdfTextExtractor {
  /** Text of every page, pages joined by newlines */
  extract(data: Uint8Array, url: string): Promise<Result<string, ParseFailedError>>;
}

export class UnpdfTextExtractor implements PdfTextExtractor {
  async extract(data: Uint8Array, url: string): Promise<Result<string, ParseFailedError>> {
    try {
      const pdf = await getDocumentProxy(data);
      const { text } = await extractText(pdf, { mergePages: false });
      return ok(text.join('\n'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return err(new ParseFailedError(url, message));
    }
  }
}
