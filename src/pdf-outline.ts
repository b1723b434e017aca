import type { OutlineDocument } from './types/outline.js';
import type { PDFDocument } from './types/pdf.js';
import { resolveOutlineConfig, type OutlineConfig, type OutlineConfigInput } from './types/config.js';
import { PDFParser } from './core/pdf-parser.js';
import { ScannedPDFDetector } from './core/scanned-pdf-detector.js';
import { OutlinePipeline } from './outline/pipeline.js';
import { emptyOutline } from './outline/assembler.js';

export class PDFOutline {
  private readonly config: OutlineConfig;
  private readonly parser: PDFParser;
  private readonly scannedDetector = new ScannedPDFDetector();
  private readonly pipeline: OutlinePipeline;

  constructor(config: OutlineConfigInput = {}) {
    this.config = resolveOutlineConfig(config);
    this.parser = new PDFParser({ maxPages: this.config.maxPages });
    this.pipeline = new OutlinePipeline(this.config);
  }

  /**
   * Reads the PDF and returns its title and heading outline.
   * Unreadable input rejects with a `PdfParseError`; a document without
   * extractable text resolves to an empty outline.
   */
  async extract(data: ArrayBuffer | Uint8Array): Promise<OutlineDocument> {
    const started = Date.now();
    const document = await this.parser.parse(data);
    const doc = this.extractFromDocument(document);

    if (this.config.debug) {
      console.debug(
        `PDFOutline: ${document.pages.length}/${document.pageCount} pages, ` +
          `${doc.outline.length} headings in ${Date.now() - started}ms`
      );
    }
    return doc;
  }

  extractFromDocument(document: PDFDocument): OutlineDocument {
    if (document.pages.length === 0) return emptyOutline();

    const scan = this.scannedDetector.analyze(document);
    if (scan.isScanned) {
      console.warn(`PDFOutline: no extractable text on ${scan.pageCount} page(s); returning an empty outline.`);
      return emptyOutline();
    }

    return this.pipeline.run(document.pages);
  }

  async dispose(): Promise<void> {
    await this.parser.dispose();
  }
}
