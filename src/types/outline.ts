import type { BoundingBox, TextRun } from './pdf.js';

export type Archetype = 'generic' | 'form' | 'rfp' | 'flyer';

export type HeadingLevel = 'TITLE' | 'H1' | 'H2' | 'H3';

export type OutlineLevel = Exclude<HeadingLevel, 'TITLE'>;

export interface Line {
  /** `<page>:<index>` */
  id: string;
  /** Reading-order position on the page. */
  index: number;
  text: string;
  bbox: BoundingBox;
  dominantFontSize: number;
  fontName: string;
  bold: boolean;
  italic: boolean;
  page: number;
  runs: TextRun[];
}

export interface PageLayout {
  page: number;
  width: number;
  height: number;
  lines: Line[];
}

export interface DocumentProfile {
  readonly archetype: Archetype;
  /** Mode of the line font sizes. */
  readonly bodyFontSize: number;
  readonly bodyLineHeight: number;
  readonly pageCount: number;
}

export interface HeadingCandidate {
  line: Line;
  level: HeadingLevel;
  /** Tie-break for deduplication only. */
  confidence: number;
}

export interface OutlineEntry {
  text: string;
  level: OutlineLevel;
  page: number;
}

export interface OutlineDocument {
  title: string;
  outline: OutlineEntry[];
}
