import { describe, it, expect } from 'vitest';
import { HeaderFooterFilter, bandOf, buildRunningTextIndex, isPageNumberText } from '../../src/outline/header-footer.js';
import type { HeadingCandidate } from '../../src/types/outline.js';
import { makeLayout, makeLine } from '../helpers/runs.js';

const options = { bandFraction: 0.1, dropPageNumbers: true };

const pageWith = (page: number, header: string, footer: string, heading: string) =>
  makeLayout(page, [
    makeLine(page, 0, header, { x0: 72, y0: 30, x1: 300, y1: 42 }),
    makeLine(page, 1, heading, { x0: 72, y0: 100, x1: 200, y1: 114 }, { size: 14, bold: true }),
    makeLine(page, 2, footer, { x0: 280, y0: 760, x1: 340, y1: 770 })
  ]);

describe('bandOf', () => {
  const layout = makeLayout(1, []);

  it('places lines by their vertical centre', () => {
    expect(bandOf(makeLine(1, 0, 'a', { x0: 0, y0: 30, x1: 10, y1: 42 }), layout, 0.1)).toBe('header');
    expect(bandOf(makeLine(1, 0, 'a', { x0: 0, y0: 760, x1: 10, y1: 770 }), layout, 0.1)).toBe('footer');
    expect(bandOf(makeLine(1, 0, 'a', { x0: 0, y0: 300, x1: 10, y1: 310 }), layout, 0.1)).toBeNull();
  });
});

describe('isPageNumberText', () => {
  it.each(['#', 'page #', 'page # of #', '- # -', '# / #'])('matches %s', (text) => {
    expect(isPageNumberText(text)).toBe(true);
  });

  it('leaves other band text alone', () => {
    expect(isPageNumberText('annual report #')).toBe(false);
  });
});

describe('buildRunningTextIndex', () => {
  it('marks text repeated in a band on most pages as running', () => {
    const pages = [
      pageWith(1, 'Acme Annual Report', 'Page 1 of 3', 'Overview'),
      pageWith(2, 'Acme Annual Report', 'Page 2 of 3', 'Finances'),
      pageWith(3, 'Draft copy', 'Page 3 of 3', 'Outlook')
    ];
    const index = buildRunningTextIndex(pages, options);

    expect([...index.runningKeys].sort()).toEqual(['footer|page # of #', 'header|acme annual report']);
    expect([...index.excludedLineIds].sort()).toEqual(['1:0', '1:2', '2:0', '2:2', '3:2']);
    expect(Object.isFrozen(index)).toBe(true);
  });

  it('does not treat single-page text as running but still drops page numbers', () => {
    const index = buildRunningTextIndex([pageWith(1, 'Acme Annual Report', '- 1 -', 'Overview')], options);

    expect(index.runningKeys.size).toBe(0);
    expect([...index.excludedLineIds]).toEqual(['1:2']);
  });

  it('keeps page numbers when dropping them is disabled', () => {
    const index = buildRunningTextIndex([pageWith(1, 'Acme Annual Report', '- 1 -', 'Overview')], {
      ...options,
      dropPageNumbers: false
    });
    expect(index.excludedLineIds.size).toBe(0);
  });

  it('ignores the same text outside the bands', () => {
    const pages = [1, 2].map((p) =>
      makeLayout(p, [makeLine(p, 0, 'Summary', { x0: 72, y0: 300, x1: 150, y1: 312 })])
    );
    expect(buildRunningTextIndex(pages, options).excludedLineIds.size).toBe(0);
  });
});

describe('HeaderFooterFilter', () => {
  it('drops candidates on excluded lines', () => {
    const pages = [pageWith(1, 'Acme', '1', 'Overview'), pageWith(2, 'Acme', '2', 'Finances')];
    const candidates: HeadingCandidate[] = pages.flatMap((p) =>
      p.lines.map((line) => ({ line, level: 'H1' as const, confidence: 0.5 }))
    );

    const filter = new HeaderFooterFilter();
    const kept = filter.filter(candidates, filter.buildIndex(pages));

    expect(kept.map((c) => c.line.text)).toEqual(['Overview', 'Finances']);
  });
});
