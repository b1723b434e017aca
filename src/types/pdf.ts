export interface BoundingBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

/**
 * A contiguous span of text sharing one font and style, as reported by the
 * PDF access layer. Coordinates are in points with the origin at the top-left
 * corner of the page.
 */
export interface TextRun {
  text: string;
  bbox: BoundingBox;
  fontName: string;
  fontSize: number;
  bold: boolean;
  italic: boolean;
  /** 1-based page number */
  page: number;
}

export interface PageRuns {
  page: number;
  width: number;
  height: number;
  runs: TextRun[];
}

export interface PDFDocument {
  pageCount: number;
  pages: PageRuns[];
}

export interface PDFParserOptions {
  /** Stop after this many pages. */
  maxPages?: number;
  /** Resolve real font names through the page's font objects (needed for bold detection). */
  resolveFontNames?: boolean;
}
