import type { TextRun } from '../../types/pdf.js';

export type BoundaryDecision = 'join' | 'space';

/** Geometry of one visual row, used to decide word and column breaks. */
export type LineGeometryModel = {
  wordGapThreshold: number;
  columnGapThreshold: number;
};

export type TextRow = {
  top: number;
  bottom: number;
  runs: TextRun[];
};
