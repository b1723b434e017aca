import type { PDFDocument, PDFParserOptions } from '../types/pdf.js';
import { PdfParseError } from './errors.js';
import { UnPDFWrapper } from './unpdf-wrapper.js';

export class PDFParser {
  private unpdfWrapper: UnPDFWrapper | null = null;

  constructor(private readonly defaults: PDFParserOptions = {}) {}

  /**
   * Parses the whole document into positioned text runs.
   * Any failure to open or read the file surfaces as a {@link PdfParseError};
   * pages without extractable text come back with an empty `runs` array.
   */
  async parse(data: ArrayBuffer | Uint8Array, options: PDFParserOptions = {}): Promise<PDFDocument> {
    const merged: PDFParserOptions = { ...this.defaults, ...options };
    if (data.byteLength === 0) {
      throw new PdfParseError('PDF data is empty');
    }

    if (!this.unpdfWrapper) this.unpdfWrapper = new UnPDFWrapper({ resolveFontNames: merged.resolveFontNames });

    try {
      return await this.unpdfWrapper.parseDocument(data, merged);
    } catch (error) {
      if (error instanceof PdfParseError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new PdfParseError(`Unable to read PDF: ${reason}`, { cause: error });
    } finally {
      await this.release();
    }
  }

  private async release(): Promise<void> {
    const wrapper = this.unpdfWrapper;
    this.unpdfWrapper = null;
    if (!wrapper) return;
    try {
      await wrapper.dispose();
    } catch (error) {
      console.warn('PDFParser: failed to release document:', error);
    }
  }

  async dispose(): Promise<void> {
    await this.release();
  }
}
