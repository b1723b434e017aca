import type { DedupeOptions } from '../types/config.js';
import type { BoundingBox } from '../types/pdf.js';
import type { HeadingCandidate, HeadingLevel, PageLayout } from '../types/outline.js';
import { DEFAULT_OUTLINE_CONFIG } from '../types/config.js';
import { normalizeForComparison } from './text-heuristics.js';

const LEVEL_RANK: Record<HeadingLevel, number> = { TITLE: 0, H1: 1, H2: 2, H3: 3 };

const area = (b: BoundingBox): number => Math.max(0, b.x1 - b.x0) * Math.max(0, b.y1 - b.y0);

const union = (a: BoundingBox, b: BoundingBox): BoundingBox => ({
  x0: Math.min(a.x0, b.x0),
  y0: Math.min(a.y0, b.y0),
  x1: Math.max(a.x1, b.x1),
  y1: Math.max(a.y1, b.y1)
});

/** Boxes that intersect, or sit within `tolerance` of each other on both axes. */
export function boxesTouch(a: BoundingBox, b: BoundingBox, tolerance: number): boolean {
  const dx = Math.max(0, Math.max(a.x0, b.x0) - Math.min(a.x1, b.x1));
  const dy = Math.max(0, Math.max(a.y0, b.y0) - Math.min(a.y1, b.y1));
  return dx <= tolerance && dy <= tolerance;
}

const sameSize = (a: HeadingCandidate, b: HeadingCandidate): boolean =>
  Math.abs(a.line.dominantFontSize - b.line.dominantFontSize) < 0.05;

const shareRow = (a: BoundingBox, b: BoundingBox): boolean => Math.min(a.y1, b.y1) - Math.max(a.y0, b.y0) > 0;

/** Equal normalised text, or one text opening or closing the other on a word boundary. */
export function textsOverlap(a: string, b: string): boolean {
  const na = normalizeForComparison(a);
  const nb = normalizeForComparison(b);
  if (!na || !nb) return false;
  if (na === nb) return true;
  const [short, long] = na.length < nb.length ? [na, nb] : [nb, na];
  return long.startsWith(`${short} `) || long.endsWith(` ${short}`);
}

export class Deduplicator {
  private readonly options: DedupeOptions;

  constructor(options?: Partial<DedupeOptions>) {
    this.options = { ...DEFAULT_OUTLINE_CONFIG.dedupe, ...options };
  }

  /**
   * Two candidates are one heading when they share a page, their boxes touch
   * with no body line between them, and one text equals or extends the other.
   * Stacked lines must also share font size and level, and a title never
   * absorbs a line set in another size. Geometry decides first; text only confirms.
   */
  isDuplicate(a: HeadingCandidate, b: HeadingCandidate, bodyLineIds: ReadonlySet<string>): boolean {
    if (a.line.page !== b.line.page) return false;

    const tallest = Math.max(a.line.bbox.y1 - a.line.bbox.y0, b.line.bbox.y1 - b.line.bbox.y0);
    if (!boxesTouch(a.line.bbox, b.line.bbox, tallest * this.options.adjacencyFactor)) return false;
    if ((a.level === 'TITLE' || b.level === 'TITLE') && !sameSize(a, b)) return false;
    if (!shareRow(a.line.bbox, b.line.bbox) && !(sameSize(a, b) && a.level === b.level)) return false;

    const lo = Math.min(a.line.index, b.line.index);
    const hi = Math.max(a.line.index, b.line.index);
    for (let i = lo + 1; i < hi; i++) {
      if (bodyLineIds.has(`${a.line.page}:${i}`)) return false;
    }

    return textsOverlap(a.line.text, b.line.text);
  }

  merge(a: HeadingCandidate, b: HeadingCandidate): HeadingCandidate {
    let keep = a;
    if (b.confidence > a.confidence || (b.confidence === a.confidence && area(b.line.bbox) > area(a.line.bbox))) {
      keep = b;
    }
    const text = b.line.text.length > a.line.text.length ? b.line.text : a.line.text;
    const level = LEVEL_RANK[a.level] <= LEVEL_RANK[b.level] ? a.level : b.level;

    return {
      line: { ...keep.line, text, bbox: union(a.line.bbox, b.line.bbox) },
      level,
      confidence: Math.max(a.confidence, b.confidence)
    };
  }

  dedupe(candidates: readonly HeadingCandidate[], pages: readonly PageLayout[]): HeadingCandidate[] {
    const candidateIds = new Set(candidates.map((c) => c.line.id));
    const bodyLineIds = new Set<string>();
    for (const page of pages) {
      for (const line of page.lines) {
        if (!candidateIds.has(line.id)) bodyLineIds.add(line.id);
      }
    }

    const kept: HeadingCandidate[] = [];
    for (const candidate of candidates) {
      const last = kept[kept.length - 1];
      if (last && this.isDuplicate(last, candidate, bodyLineIds)) {
        kept[kept.length - 1] = this.merge(last, candidate);
      } else {
        kept.push(candidate);
      }
    }
    return kept;
  }
}
