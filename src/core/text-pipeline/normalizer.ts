import type { TextRun } from '../../types/pdf.js';

function stripZeroWidth(s: string): string {
  return s.replace(/[\u200B-\u200D\uFEFF]/g, '');
}

/**
 * Splits a run that the extractor reported as one box spanning several text
 * lines back into one run per line, sharing the box height evenly.
 */
export function splitMultiLineRun(run: TextRun, multiLineFactor: number): TextRun[] {
  const height = run.bbox.y1 - run.bbox.y0;
  const parts = run.text.split(/\r\n|\r|\n/);
  if (parts.length < 2) return [run];

  if (height <= run.fontSize * multiLineFactor) {
    return [{ ...run, text: parts.join(' ') }];
  }

  const step = height / parts.length;
  const out: TextRun[] = [];
  parts.forEach((part, i) => {
    if (part.trim().length === 0) return;
    out.push({
      ...run,
      text: part,
      bbox: {
        x0: run.bbox.x0,
        x1: run.bbox.x1,
        y0: run.bbox.y0 + step * i,
        y1: run.bbox.y0 + step * (i + 1)
      }
    });
  });
  return out;
}

export function normalizeRuns(runs: readonly TextRun[], multiLineFactor: number): TextRun[] {
  const out: TextRun[] = [];

  for (const run of runs) {
    const text = stripZeroWidth(run.text);
    if (text.trim().length === 0) continue;
    if (!(run.fontSize > 0)) continue;
    out.push(...splitMultiLineRun({ ...run, text }, multiLineFactor));
  }

  return out;
}
