import type { HeaderFooterOptions } from '../types/config.js';
import type { HeadingCandidate, Line, PageLayout } from '../types/outline.js';
import { DEFAULT_OUTLINE_CONFIG } from '../types/config.js';
import { normalizeForRepetition } from './text-heuristics.js';

export type PageBand = 'header' | 'footer';

export interface RunningTextIndex {
  /** `<band>|<normalised text>` keys that repeat on a majority of pages. */
  readonly runningKeys: ReadonlySet<string>;
  /** Ids of lines excluded from the outline. */
  readonly excludedLineIds: ReadonlySet<string>;
}

const PAGE_NUMBER_PATTERNS: readonly RegExp[] = [
  /^#$/,
  /^page #$/,
  /^page # of #$/,
  /^#\s*(\/|of)\s*#$/,
  /^[-–—]\s*#\s*[-–—]$/
];

export function bandOf(line: Line, page: PageLayout, bandFraction: number): PageBand | null {
  if (!(page.height > 0)) return null;
  const centre = (line.bbox.y0 + line.bbox.y1) / 2 / page.height;
  if (centre <= bandFraction) return 'header';
  if (centre >= 1 - bandFraction) return 'footer';
  return null;
}

export const isPageNumberText = (normalized: string): boolean => PAGE_NUMBER_PATTERNS.some((p) => p.test(normalized));

/**
 * Finds running headers and footers: text that recurs, digits aside, in the
 * same top or bottom band on more than half of the pages.
 */
export function buildRunningTextIndex(pages: readonly PageLayout[], options: HeaderFooterOptions): RunningTextIndex {
  const keyedLines: Array<{ key: string; normalized: string; line: Line }> = [];
  const pagesByKey = new Map<string, Set<number>>();

  for (const page of pages) {
    for (const line of page.lines) {
      const band = bandOf(line, page, options.bandFraction);
      if (!band) continue;
      const normalized = normalizeForRepetition(line.text);
      if (!normalized) continue;
      const key = `${band}|${normalized}`;
      keyedLines.push({ key, normalized, line });
      const seen = pagesByKey.get(key) ?? new Set<number>();
      seen.add(page.page);
      pagesByKey.set(key, seen);
    }
  }

  const runningKeys = new Set<string>();
  if (pages.length >= 2) {
    for (const [key, seen] of pagesByKey) {
      if (seen.size * 2 > pages.length) runningKeys.add(key);
    }
  }

  const excludedLineIds = new Set<string>();
  for (const { key, normalized, line } of keyedLines) {
    if (runningKeys.has(key) || (options.dropPageNumbers && isPageNumberText(normalized))) {
      excludedLineIds.add(line.id);
    }
  }

  return Object.freeze({ runningKeys, excludedLineIds });
}

export class HeaderFooterFilter {
  private readonly options: HeaderFooterOptions;

  constructor(options?: Partial<HeaderFooterOptions>) {
    this.options = { ...DEFAULT_OUTLINE_CONFIG.headerFooter, ...options };
  }

  buildIndex(pages: readonly PageLayout[]): RunningTextIndex {
    return buildRunningTextIndex(pages, this.options);
  }

  filter(candidates: readonly HeadingCandidate[], index: RunningTextIndex): HeadingCandidate[] {
    return candidates.filter((c) => !index.excludedLineIds.has(c.line.id));
  }
}
