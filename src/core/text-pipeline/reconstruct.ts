import type { BoundingBox, PageRuns, TextRun } from '../../types/pdf.js';
import type { ReconstructionOptions } from '../../types/config.js';
import type { Line, PageLayout } from '../../types/outline.js';
import type { TextRow } from './types.js';
import { normalizeRuns } from './normalizer.js';
import { buildLineGeometryModel } from './line-model.js';
import { classifyBoundary } from './classifier.js';

export function reconstructLineText(runs: readonly TextRun[], options: ReconstructionOptions): string {
  const ordered = [...runs].sort((a, b) => a.bbox.x0 - b.bbox.x0);
  const model = buildLineGeometryModel(ordered, options);

  const parts: string[] = [];
  for (let i = 0; i < ordered.length; i++) {
    const run = ordered[i];
    if (i > 0 && classifyBoundary(ordered[i - 1], run, model) === 'space') parts.push(' ');
    parts.push(run.text);
  }

  return parts.join('').replace(/\s+/g, ' ').trim();
}

const verticalOverlapRatio = (row: TextRow, run: TextRun): number => {
  const overlap = Math.min(row.bottom, run.bbox.y1) - Math.max(row.top, run.bbox.y0);
  if (overlap <= 0) return 0;
  const smaller = Math.min(row.bottom - row.top, run.bbox.y1 - run.bbox.y0);
  return smaller > 0 ? overlap / smaller : 0;
};

/** Same text drawn again over most of an earlier run's width, as fake bold is. */
export function isOverprint(a: TextRun, b: TextRun): boolean {
  if (a.text.trim() !== b.text.trim()) return false;
  const overlap = Math.min(a.bbox.x1, b.bbox.x1) - Math.max(a.bbox.x0, b.bbox.x0);
  const narrower = Math.min(a.bbox.x1 - a.bbox.x0, b.bbox.x1 - b.bbox.x0);
  return narrower > 0 && overlap >= narrower * 0.8;
}

/**
 * Groups runs into visual rows. Sub- and superscripts overlap their row and
 * stay in it; overprinted copies of a run already in the row are dropped.
 */
export function groupRows(runs: readonly TextRun[], options: ReconstructionOptions): TextRow[] {
  const sorted = [...runs].sort((a, b) => a.bbox.y0 - b.bbox.y0 || a.bbox.x0 - b.bbox.x0);
  const rows: TextRow[] = [];

  for (const run of sorted) {
    let best: TextRow | null = null;
    let bestRatio = 0;
    for (const row of rows) {
      if (row.bottom <= run.bbox.y0) continue;
      const ratio = verticalOverlapRatio(row, run);
      if (ratio >= options.sameLineOverlap && ratio > bestRatio) {
        best = row;
        bestRatio = ratio;
      }
    }

    if (best) {
      if (best.runs.some((r) => isOverprint(r, run))) continue;
      best.runs.push(run);
      best.top = Math.min(best.top, run.bbox.y0);
      best.bottom = Math.max(best.bottom, run.bbox.y1);
    } else {
      rows.push({ top: run.bbox.y0, bottom: run.bbox.y1, runs: [run] });
    }
  }

  return rows.sort((a, b) => a.top - b.top);
}

/** Splits a row wherever the horizontal gap is wide enough to be a column gutter. */
export function splitRowSegments(row: TextRow, options: ReconstructionOptions): TextRun[][] {
  const ordered = [...row.runs].sort((a, b) => a.bbox.x0 - b.bbox.x0);
  const model = buildLineGeometryModel(ordered, options);
  const segments: TextRun[][] = [];
  let current: TextRun[] = [];
  let right = Number.NEGATIVE_INFINITY;

  for (const run of ordered) {
    if (current.length > 0 && run.bbox.x0 - right > model.columnGapThreshold) {
      segments.push(current);
      current = [];
      right = Number.NEGATIVE_INFINITY;
    }
    current.push(run);
    right = Math.max(right, run.bbox.x1);
  }
  if (current.length > 0) segments.push(current);
  return segments;
}

const unionBox = (runs: readonly TextRun[]): BoundingBox => ({
  x0: Math.min(...runs.map((r) => r.bbox.x0)),
  y0: Math.min(...runs.map((r) => r.bbox.y0)),
  x1: Math.max(...runs.map((r) => r.bbox.x1)),
  y1: Math.max(...runs.map((r) => r.bbox.y1))
});

const charCount = (run: TextRun): number => run.text.replace(/\s+/g, '').length;

/** Size, weight, slant and font that cover the plurality of the line's characters. */
export function dominantStyle(runs: readonly TextRun[]): Pick<Line, 'dominantFontSize' | 'bold' | 'italic' | 'fontName'> {
  const bySize = new Map<number, number>();
  const byFont = new Map<string, number>();
  let total = 0;
  let boldChars = 0;
  let italicChars = 0;

  for (const run of runs) {
    const n = charCount(run);
    const size = Math.round(run.fontSize * 10) / 10;
    bySize.set(size, (bySize.get(size) ?? 0) + n);
    byFont.set(run.fontName, (byFont.get(run.fontName) ?? 0) + n);
    total += n;
    if (run.bold) boldChars += n;
    if (run.italic) italicChars += n;
  }

  let dominantFontSize = 0;
  let sizeCount = -1;
  for (const [size, count] of bySize) {
    if (count > sizeCount || (count === sizeCount && size > dominantFontSize)) {
      dominantFontSize = size;
      sizeCount = count;
    }
  }

  let fontName = '';
  let fontCount = -1;
  for (const [name, count] of byFont) {
    if (count > fontCount) {
      fontName = name;
      fontCount = count;
    }
  }

  return {
    dominantFontSize,
    fontName,
    bold: boldChars * 2 > total,
    italic: italicChars * 2 > total
  };
}

export function reconstructPageLines(page: PageRuns, options: ReconstructionOptions): PageLayout {
  const runs = normalizeRuns(page.runs, options.multiLineFactor);
  const lines: Line[] = [];

  for (const row of groupRows(runs, options)) {
    for (const segment of splitRowSegments(row, options)) {
      const ordered = [...segment].sort((a, b) => a.bbox.x0 - b.bbox.x0);
      const text = reconstructLineText(ordered, options);
      if (!text) continue;
      const index = lines.length;
      lines.push({
        id: `${page.page}:${index}`,
        index,
        text,
        bbox: unionBox(ordered),
        ...dominantStyle(ordered),
        page: page.page,
        runs: ordered
      });
    }
  }

  return {
    page: page.page,
    width: page.width,
    height: page.height,
    lines
  };
}
