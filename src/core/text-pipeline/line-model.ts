import type { TextRun } from '../../types/pdf.js';
import type { ReconstructionOptions } from '../../types/config.js';
import type { LineGeometryModel } from './types.js';

export function buildLineGeometryModel(runs: readonly TextRun[], options: ReconstructionOptions): LineGeometryModel {
  const sizes = runs.map((r) => r.fontSize).filter((s) => Number.isFinite(s) && s > 0);
  const medianFontSize = median(sizes) || 12;

  return {
    wordGapThreshold: medianFontSize * options.wordGapFactor,
    columnGapThreshold: medianFontSize * options.columnGapFactor
  };
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}
