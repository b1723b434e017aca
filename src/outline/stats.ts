import type { Line, PageLayout } from '../types/outline.js';
import { median } from '../core/text-pipeline/line-model.js';

export interface DocumentStatistics {
  pageCount: number;
  lineCount: number;
  bodyFontSize: number;
  bodyLineHeight: number;
  /** Line counts keyed by font size rounded to 0.1pt. */
  fontSizes: Map<number, number>;
  /** Share of the page area covered by line boxes, over all pages. */
  textCoverage: number;
}

const DEFAULT_BODY_FONT_SIZE = 12;

export const roundFontSize = (size: number): number => Math.round(size * 10) / 10;

export function fontSizeHistogram(lines: readonly Line[]): Map<number, number> {
  const sizes = new Map<number, number>();
  for (const line of lines) {
    const size = roundFontSize(line.dominantFontSize);
    sizes.set(size, (sizes.get(size) ?? 0) + 1);
  }
  return sizes;
}

/** Most frequent line font size; ties go to the smaller size. */
export function modeFontSize(histogram: ReadonlyMap<number, number>): number {
  let best = 0;
  let bestCount = 0;
  for (const [size, count] of histogram) {
    if (count > bestCount || (count === bestCount && size < best)) {
      best = size;
      bestCount = count;
    }
  }
  return bestCount > 0 ? best : DEFAULT_BODY_FONT_SIZE;
}

export class DocumentStatisticsAnalyzer {
  analyze(pages: readonly PageLayout[]): DocumentStatistics {
    const lines = pages.flatMap((p) => p.lines);
    const fontSizes = fontSizeHistogram(lines);
    const bodyFontSize = modeFontSize(fontSizes);

    const bodyHeights = lines
      .filter((l) => Math.abs(roundFontSize(l.dominantFontSize) - bodyFontSize) < 0.05)
      .map((l) => l.bbox.y1 - l.bbox.y0)
      .filter((h) => h > 0);
    const bodyLineHeight = median(bodyHeights) || bodyFontSize * 1.2;

    let pageArea = 0;
    let textArea = 0;
    for (const page of pages) {
      pageArea += Math.max(0, page.width * page.height);
      for (const line of page.lines) {
        textArea += Math.max(0, line.bbox.x1 - line.bbox.x0) * Math.max(0, line.bbox.y1 - line.bbox.y0);
      }
    }

    return {
      pageCount: pages.length,
      lineCount: lines.length,
      bodyFontSize,
      bodyLineHeight,
      fontSizes,
      textCoverage: pageArea > 0 ? textArea / pageArea : 0
    };
  }
}
