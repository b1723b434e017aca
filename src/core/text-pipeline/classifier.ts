import type { TextRun } from '../../types/pdf.js';
import type { BoundaryDecision, LineGeometryModel } from './types.js';

/**
 * Decides whether two horizontally adjacent runs on one row are separate
 * words. Runs split at a font or style change inside a word sit flush against
 * each other and are joined without a separator.
 */
export function classifyBoundary(prev: TextRun, next: TextRun, model: LineGeometryModel): BoundaryDecision {
  const prevText = prev.text;
  const nextText = next.text;

  const rawGap = next.bbox.x0 - prev.bbox.x1;
  const avgFontSize = Math.max(1, (prev.fontSize + next.fontSize) / 2);
  const tolerance = avgFontSize * 0.25;
  const gapPt = rawGap < 0 && rawGap >= -tolerance ? 0 : rawGap;
  const thresholdPt = Math.max(model.wordGapThreshold, avgFontSize * 0.1);

  if (gapPt < 0) return 'join';

  // The separator is already part of the text.
  if (/\s$/.test(prevText) || /^\s/.test(nextText)) return 'join';

  if (/^[,.;:!?)\]}%]/.test(nextText) || /[([{/]$/.test(prevText)) return 'join';

  return gapPt >= thresholdPt ? 'space' : 'join';
}
