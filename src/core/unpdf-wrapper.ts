import { getDocumentProxy } from 'unpdf';
import type { PDFDocument, PDFParserOptions, PageRuns } from '../types/pdf.js';
import { PDFJSTextExtractor, type PDFJSPage } from './pdfjs-text-extractor.js';

type PDFJSDocument = {
  numPages: number;
  getPage(pageNumber: number): Promise<PDFJSPage>;
  destroy?(): Promise<void>;
};

export class UnPDFWrapper {
  private document: PDFJSDocument | null = null;
  private textExtractor: PDFJSTextExtractor;

  constructor(options: Pick<PDFParserOptions, 'resolveFontNames'> = {}) {
    this.textExtractor = new PDFJSTextExtractor(options.resolveFontNames ?? true);
  }

  async loadDocument(data: ArrayBuffer | Uint8Array): Promise<void> {
    // pdf.js takes ownership of the buffer it is given, so hand it a copy.
    const bytes = data instanceof Uint8Array ? new Uint8Array(data) : new Uint8Array(data.slice(0));
    const proxy: PDFJSDocument = await getDocumentProxy(bytes);
    this.document = proxy;
  }

  async getPageCount(): Promise<number> {
    if (!this.document) {
      throw new Error('Document not loaded');
    }
    return this.document.numPages;
  }

  /** @param pageIndex 0-based page index */
  async parsePage(pageIndex: number): Promise<PageRuns> {
    if (!this.document) {
      throw new Error('Document not loaded');
    }

    const pdfPage = await this.document.getPage(pageIndex + 1);
    const viewport = pdfPage.getViewport({ scale: 1.0 });
    const runs = await this.textExtractor.extractRuns(pdfPage, pageIndex + 1);

    return {
      page: pageIndex + 1,
      width: viewport.width,
      height: viewport.height,
      runs
    };
  }

  async parseDocument(data: ArrayBuffer | Uint8Array, options: PDFParserOptions = {}): Promise<PDFDocument> {
    await this.loadDocument(data);

    const pageCount = await this.getPageCount();
    const limit = options.maxPages !== undefined ? Math.min(pageCount, options.maxPages) : pageCount;
    const pages: PageRuns[] = [];

    for (let i = 0; i < limit; i++) {
      pages.push(await this.parsePage(i));
    }

    return {
      pageCount,
      pages
    };
  }

  async dispose(): Promise<void> {
    const doc = this.document;
    this.document = null;
    if (doc && typeof doc.destroy === 'function') {
      await doc.destroy();
    }
  }
}
