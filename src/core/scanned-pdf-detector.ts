import type { PDFDocument } from '../types/pdf.js';

export interface ScannedPDFAnalysis {
  isScanned: boolean;
  pageCount: number;
}

/**
 * Detects documents whose pages carry no extractable text, typically scans
 * that are nothing but page-sized images. Such documents produce an empty
 * outline rather than an error.
 */
export class ScannedPDFDetector {
  analyze(document: PDFDocument): ScannedPDFAnalysis {
    const hasText = document.pages.some((page) => page.runs.some((run) => run.text.trim().length > 0));

    return {
      isScanned: document.pages.length > 0 && !hasText,
      pageCount: document.pages.length
    };
  }
}
